import { describe, expect, it } from "vitest";
import { SlideProcessingPipeline } from "../src/application/pipeline/slide.processing.pipeline";
import { createSlideProcessingSteps, SlideProcessingTimeouts } from "../src/application/pipeline/slide.processing.steps";
import { JobRequest } from "../src/domain/entities/job";
import { AiProvider } from "../src/domain/enums/ai-provider";
import { InMemoryJobStore } from "../src/infrastructure/jobs/in.memory.job.store";
import { echoTranslation, hangUntilAborted, ScriptedTextProvider } from "./support/fakes";
import {
  FakeFrameCapture,
  FakeMachineTranslator,
  FakeProviderFactory,
  FakeSubtitleSource,
  FakeTranscriptionProvider,
  FakeVideoSource,
  MemoryArtifactStorage,
} from "./support/pipeline.fakes";

const TIMEOUTS: SlideProcessingTimeouts = {
  providerTimeoutMs: 1000,
  fetchTimeoutMs: 1000,
  frameCaptureTimeoutMs: 1000,
  translationMaxRetries: 1,
  translationConcurrency: 2,
};

function baseRequest(overrides: Partial<JobRequest> = {}): JobRequest {
  return {
    url: "https://video.example.com/watch?v=vid123",
    quality: "720",
    screenshotPosition: "middle",
    screenshotOffset: 0,
    generateOutline: false,
    useAiTranscription: false,
    translateTo: null,
    ...overrides,
  };
}

function outlineOrEcho(prompt: string): string {
  return prompt.startsWith("Write a structured outline") ? "## Overview\nTides in three slides." : echoTranslation(prompt);
}

function setup(
  options: {
    provider?: ScriptedTextProvider;
    configured?: AiProvider[];
    timeouts?: Partial<SlideProcessingTimeouts>;
    transcription?: FakeTranscriptionProvider;
  } = {}
) {
  const jobStore = new InMemoryJobStore();
  const storage = new MemoryArtifactStorage();
  const videoSource = new FakeVideoSource();
  const subtitleSource = new FakeSubtitleSource();
  const frameCapture = new FakeFrameCapture();
  const transcriptionProvider = options.transcription ?? new FakeTranscriptionProvider(new Error("not used"));
  const provider = options.provider ?? new ScriptedTextProvider(async (prompt) => outlineOrEcho(prompt));
  const providerFactory = new FakeProviderFactory(provider, options.configured);

  const steps = createSlideProcessingSteps(
    {
      videoSource,
      subtitleSource,
      frameCapture,
      transcriptionProvider,
      providerFactory,
      machineTranslator: new FakeMachineTranslator(),
      storage,
    },
    { ...TIMEOUTS, ...options.timeouts }
  );
  const pipeline = new SlideProcessingPipeline(steps, jobStore, {
    onSettled: async (context) => {
      if (context.videoHandle) {
        await videoSource.release(context.videoHandle);
      }
    },
  });

  return { jobStore, storage, videoSource, subtitleSource, frameCapture, transcriptionProvider, provider, pipeline };
}

describe("SlideProcessingPipeline", () => {
  it("takes a job from queued to complete", async () => {
    const { jobStore, storage, videoSource, pipeline, provider } = setup();
    const job = await jobStore.create(
      baseRequest({ translateTo: "es", aiProvider: "openai", translationEngine: "ai", generateOutline: true })
    );

    const finished = await pipeline.run(job.id);

    expect(finished?.status).toBe("completed");
    expect(finished?.progress).toBe(100);
    expect(finished?.message).toBe("Created 3 slides");
    expect(finished?.completedAt).toBeInstanceOf(Date);

    const result = finished?.result;
    expect(result?.videoId).toBe("vid123");
    expect(result?.subtitleLanguage).toBe("en");
    expect(result?.translatedTo).toBe("es");
    expect(result?.frames.map((f) => [f.artifactName, f.timestamp, f.sizeBytes])).toEqual([
      ["frame_0001.jpg", 1, 20],
      ["frame_0002.jpg", 3, 20],
      ["frame_0003.jpg", 5, 20],
    ]);
    expect(result?.frames[1].subtitle).toBe("That makes the tide rise.");
    expect(result?.frames[1].translatedSubtitle).toBe("T:That makes the tide rise.");
    expect(result?.outline).toBe("## Overview\nTides in three slides.");
    expect(result?.outlineProvider).toBe("openai/test-model");
    expect(result?.reconciliationEvents).toEqual([]);
    expect(provider.calls).toHaveLength(2);

    expect(await storage.list(job.id)).toEqual([
      "frame_0001.jpg",
      "frame_0002.jpg",
      "frame_0003.jpg",
      "result.json",
      "subtitles.en.srt",
      "subtitles.es.translated.srt",
    ]);
    expect(videoSource.released).toHaveLength(1);
  });

  it("records an append-only history with non-decreasing progress", async () => {
    const { jobStore, pipeline } = setup();
    const job = await jobStore.create(baseRequest({ translateTo: "es", aiProvider: "openai" }));

    const finished = await pipeline.run(job.id);
    const history = finished?.history ?? [];

    expect(history.map((entry) => entry.progress)).toEqual([
      0, 5, 10, 20, 29, 38, 38, 40, 50, 58, 65, 68, 75, 75, 86, 86, 92, 92, 98, 100,
    ]);
    expect([...new Set(history.map((entry) => entry.step))]).toEqual([
      "queued",
      "prepare",
      "metadata",
      "download_video",
      "fetch_subtitles",
      "ai_transcription",
      "subtitle_optimize",
      "subtitle_parse",
      "keyframe_selection",
      "translate",
      "frame_capture",
      "frame_optimize",
      "ai_outline",
      "finalize",
      "complete",
    ]);
    expect(history.find((entry) => entry.step === "ai_transcription")?.message).toBe("Transcribing audio (skipped)");
  });

  it("skips translation and outline when they were not requested", async () => {
    const { jobStore, pipeline, provider } = setup();
    const job = await jobStore.create(baseRequest());

    const finished = await pipeline.run(job.id);

    expect(finished?.status).toBe("completed");
    expect(finished?.result?.translatedTo).toBeUndefined();
    expect(finished?.result?.outline).toBeUndefined();
    expect(provider.calls).toHaveLength(0);
    expect(finished?.history.find((e) => e.step === "translate")?.message).toBe("Translating subtitles (skipped)");
    expect(finished?.history.find((e) => e.step === "ai_outline")?.message).toBe("Generating outline (skipped)");
  });

  it("fails the job when a frame cannot be captured", async () => {
    const { jobStore, storage, frameCapture, videoSource, pipeline } = setup();
    frameCapture.failAt = 3;
    const job = await jobStore.create(baseRequest());

    const finished = await pipeline.run(job.id);

    expect(finished?.status).toBe("failed");
    expect(finished?.error).toBe("Failed to capture frame at 3.000s");
    expect(finished?.errorCause).toBe("disk full");
    expect(finished?.message).toBe("Failed during frame_capture: Failed to capture frame at 3.000s");
    expect(finished?.currentStep).toBe("failed");
    expect(finished?.result).toBeUndefined();
    expect(await storage.get(job.id, "result.json")).toBeNull();
    expect(videoSource.released).toHaveLength(1);
  });

  it("completes with untranslated cues when every translation attempt times out", async () => {
    const provider = new ScriptedTextProvider(async (_prompt, config) => hangUntilAborted(config));
    const { jobStore, pipeline } = setup({ provider, timeouts: { providerTimeoutMs: 20 } });
    const job = await jobStore.create(baseRequest({ translateTo: "es", aiProvider: "openai" }));

    const finished = await pipeline.run(job.id);

    expect(finished?.status).toBe("completed");
    expect(finished?.result?.cues.map((cue) => cue.translatedText)).toEqual([
      "The moon pulls the ocean.",
      "That makes the tide rise.",
      "It happens twice a day.",
    ]);
    expect(finished?.result?.reconciliationEvents.map((e) => [e.kind, e.cueIndex])).toEqual([
      ["passthrough", 0],
      ["passthrough", 1],
      ["passthrough", 2],
    ]);
    expect(finished?.result?.warnings).toContainEqual({
      step: "translate",
      message: "1/1 translation unit(s) left untranslated",
    });
    expect(provider.calls).toHaveLength(2);
  });

  it("stops without further calls when cancelled between frame capture and optimization", async () => {
    const { jobStore, storage, frameCapture, pipeline, provider } = setup();
    const job = await jobStore.create(
      baseRequest({ translateTo: "es", aiProvider: "openai", generateOutline: true })
    );
    let callsAtCancel = -1;
    frameCapture.afterExtract = async (timestamp) => {
      if (timestamp === 5) {
        callsAtCancel = provider.calls.length;
        await jobStore.requestCancellation(job.id);
      }
    };

    const finished = await pipeline.run(job.id);

    expect(finished?.status).toBe("cancelled");
    expect(finished?.message).toBe("Cancelled during frame_optimize");
    expect(finished?.currentStep).toBe("cancelled");
    expect(frameCapture.optimizeCalls).toBe(0);
    expect(provider.calls.length).toBe(callsAtCancel);
    expect(await storage.get(job.id, "result.json")).toBeNull();
  });

  it("does not run a job that is already terminal", async () => {
    const { jobStore, pipeline, frameCapture } = setup();
    const job = await jobStore.create(baseRequest());
    await jobStore.recordProgress(job.id, { step: "cancelled", progress: 0, status: "cancelled", message: "Cancelled" });

    const result = await pipeline.run(job.id);

    expect(result?.status).toBe("cancelled");
    expect(frameCapture.extracted).toEqual([]);
  });

  it("returns null for an unknown job", async () => {
    const { pipeline } = setup();

    expect(await pipeline.run("missing")).toBeNull();
  });

  it("fails when the video has no subtitles and no transcription was requested", async () => {
    const { jobStore, subtitleSource, pipeline } = setup();
    subtitleSource.track = null;
    const job = await jobStore.create(baseRequest());

    const finished = await pipeline.run(job.id);

    expect(finished?.status).toBe("failed");
    expect(finished?.message).toBe(
      "Failed during fetch_subtitles: This video has no subtitles in the requested languages"
    );
  });

  it("uses the AI transcript instead of the platform track", async () => {
    const transcription = new FakeTranscriptionProvider({
      language: "en",
      segments: [
        { startSec: 0, endSec: 3, text: " Spoken first part. " },
        { startSec: 3, endSec: 6, text: "Spoken second part." },
      ],
    });
    const { jobStore, pipeline } = setup({ transcription });
    const job = await jobStore.create(baseRequest({ useAiTranscription: true }));

    const finished = await pipeline.run(job.id);

    expect(finished?.status).toBe("completed");
    expect(finished?.result?.cues.map((cue) => cue.sourceText)).toEqual(["Spoken first part.", "Spoken second part."]);
    expect(transcription.calls).toBe(1);
  });

  it("falls back to the platform track when transcription fails", async () => {
    const transcription = new FakeTranscriptionProvider(new Error("audio too long"));
    const { jobStore, pipeline } = setup({ transcription });
    const job = await jobStore.create(baseRequest({ useAiTranscription: true }));

    const finished = await pipeline.run(job.id);

    expect(finished?.status).toBe("completed");
    expect(finished?.result?.cues).toHaveLength(3);
    expect(finished?.result?.warnings).toContainEqual({
      step: "ai_transcription",
      message: "AI transcription failed (audio too long), using platform subtitles",
    });
  });

  it("fails when transcription fails and there is no platform track", async () => {
    const transcription = new FakeTranscriptionProvider(new Error("audio too long"));
    const { jobStore, subtitleSource, pipeline } = setup({ transcription });
    subtitleSource.track = null;
    const job = await jobStore.create(baseRequest({ useAiTranscription: true }));

    const finished = await pipeline.run(job.id);

    expect(finished?.status).toBe("failed");
    expect(finished?.message).toBe("Failed during ai_transcription: AI transcription failed");
    expect(finished?.errorCause).toBe("audio too long");
  });

  it("uses machine translation when the AI provider has no credentials", async () => {
    const { jobStore, pipeline, provider } = setup({ configured: [] });
    const job = await jobStore.create(
      baseRequest({ translateTo: "fr", aiProvider: "claude", translationEngine: "ai" })
    );

    const finished = await pipeline.run(job.id);

    expect(finished?.status).toBe("completed");
    expect(finished?.result?.cues[0].translatedText).toBe("[fr] The moon pulls the ocean.");
    expect(finished?.result?.warnings).toContainEqual({
      step: "prepare",
      message: "No credentials for claude, using machine translation",
    });
    expect(provider.calls).toHaveLength(0);
  });

  it("skips translation into the language the subtitles are already in", async () => {
    const { jobStore, pipeline, provider } = setup();
    const job = await jobStore.create(baseRequest({ translateTo: "en", aiProvider: "openai" }));

    const finished = await pipeline.run(job.id);

    expect(finished?.result?.translatedTo).toBeUndefined();
    expect(provider.calls).toHaveLength(0);
  });
});
