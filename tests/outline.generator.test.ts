import { describe, expect, it } from "vitest";
import {
  buildOutlinePrompt,
  OMISSION_MARKER,
  OutlineGenerator,
  sampleCueTexts,
} from "../src/application/services/outline.generator";
import { ScriptedTextProvider } from "./support/fakes";

const input = { title: "Intro to Tides", cueTexts: ["The moon pulls the sea.", "Twice a day."], outputLanguage: "en" };

describe("sampleCueTexts", () => {
  it("keeps short transcripts whole", () => {
    const texts = Array.from({ length: 300 }, (_, i) => `t${i}`);

    expect(sampleCueTexts(texts)).toBe(texts);
  });

  it("samples the beginning, middle and end of long transcripts", () => {
    const texts = Array.from({ length: 301 }, (_, i) => `t${i}`);
    const sample = sampleCueTexts(texts);

    expect(sample).toHaveLength(302);
    expect(sample[99]).toBe("t99");
    expect(sample[100]).toBe(OMISSION_MARKER);
    expect(sample[101]).toBe("t100");
    expect(sample[201]).toBe(OMISSION_MARKER);
    expect(sample[202]).toBe("t201");
    expect(sample[301]).toBe("t300");
  });
});

describe("buildOutlinePrompt", () => {
  it("names the output language and includes the transcript", () => {
    const prompt = buildOutlinePrompt(input);

    expect(prompt.split("\n")[0]).toBe("Write a structured outline of the video below in English.");
    expect(prompt).toContain("Title: Intro to Tides");
    expect(prompt).toContain("The moon pulls the sea.\nTwice a day.");
    expect(prompt).not.toContain("Description:");
  });

  it("truncates the description to 500 characters", () => {
    const prompt = buildOutlinePrompt({ ...input, description: "d".repeat(600) });

    expect(prompt).toContain(`Description: ${"d".repeat(500)}\n`);
    expect(prompt).not.toContain("d".repeat(501));
  });
});

describe("OutlineGenerator", () => {
  it("returns the trimmed outline with the provider and model used", async () => {
    const provider = new ScriptedTextProvider(async () => "  ## Overview\nTides.  ", "gemini", "gemini-test");

    const outcome = await new OutlineGenerator(1000).generate(provider, input);

    expect(outcome).toEqual({ provider: "gemini", model: "gemini-test", outline: "## Overview\nTides." });
    expect(provider.calls[0].config.temperature).toBe(0.7);
    expect(provider.calls[0].config.maxTokens).toBe(2000);
  });

  it("uses the requested model", async () => {
    const provider = new ScriptedTextProvider(async () => "outline");

    const outcome = await new OutlineGenerator(1000).generate(provider, input, { model: "other-model" });

    expect(outcome.model).toBe("other-model");
    expect(provider.calls[0].config.model).toBe("other-model");
  });

  it("reports a provider failure instead of throwing", async () => {
    const provider = new ScriptedTextProvider(async () => {
      throw new Error("quota exceeded");
    });

    const outcome = await new OutlineGenerator(1000).generate(provider, input);

    expect(outcome).toEqual({ provider: "openai", model: "test-model", error: "quota exceeded" });
  });

  it("treats an empty outline as a failure", async () => {
    const provider = new ScriptedTextProvider(async () => "   ");

    const outcome = await new OutlineGenerator(1000).generate(provider, input);

    expect(outcome.error).toBe("Provider returned an empty outline");
    expect(outcome.outline).toBeUndefined();
  });
});
