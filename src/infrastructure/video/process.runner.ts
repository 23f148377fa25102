import { spawn } from "child_process";

export interface ProcessRunOptions {
  signal?: AbortSignal;
  input?: Buffer; // written to stdin, which is then closed
  onOutputLine?: (line: string) => void; // stdout and stderr, line by line
}

export interface ProcessRunResult {
  stdout: Buffer;
  stderr: string;
}

export class ProcessExitError extends Error {
  constructor(
    readonly command: string,
    readonly exitCode: number | null,
    readonly stderr: string
  ) {
    super(`${command} exited with code ${exitCode}: ${stderr.trim().split("\n").slice(-3).join(" | ")}`);
    this.name = "ProcessExitError";
  }
}

/**
 * Runs a binary without a shell, so paths and URLs need no escaping.
 * Rejects on a non-zero exit, a spawn error or an aborted signal.
 */
export function runProcess(command: string, args: string[], options: ProcessRunOptions = {}): Promise<ProcessRunResult> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { signal: options.signal, stdio: ["pipe", "pipe", "pipe"] });
    const stdout: Buffer[] = [];
    let stderr = "";
    let pending = "";

    const emitLines = (text: string) => {
      if (!options.onOutputLine) return;
      pending += text;
      const lines = pending.split(/\r?\n|\r/);
      pending = lines.pop() ?? "";
      for (const line of lines) {
        if (line.trim()) options.onOutputLine(line);
      }
    };

    child.stdout.on("data", (data: Buffer) => {
      stdout.push(data);
      emitLines(data.toString());
    });
    child.stderr.on("data", (data: Buffer) => {
      stderr += data.toString();
      emitLines(data.toString());
    });

    child.on("error", (error) => reject(error));
    child.on("close", (code) => {
      if (code === 0) {
        resolve({ stdout: Buffer.concat(stdout), stderr });
      } else {
        reject(new ProcessExitError(command, code, stderr));
      }
    });

    if (options.input) {
      child.stdin.on("error", (error) => {
        console.warn(`[runProcess] ${command} closed stdin early: ${error.message}`);
      });
      child.stdin.end(options.input);
    } else {
      child.stdin.end();
    }
  });
}
