import express from "express";
import cors from "cors";
import { config } from "./infrastructure/config/app.config";
import { connectToMongoDB, closeMongoDBConnection } from "./infrastructure/database/mongodb.connection";
import { MongoJobRepository } from "./infrastructure/database/repositories/job.repository";
import { InMemoryJobStore } from "./infrastructure/jobs/in.memory.job.store";
import { LocalArtifactStorage } from "./infrastructure/storage/local.artifact.storage";
import { S3ArtifactStorage } from "./infrastructure/aws/s3.artifact.storage";
import { YtDlpVideoSource } from "./infrastructure/video/ytdlp.video.source";
import { YtDlpSubtitleSource } from "./infrastructure/video/ytdlp.subtitle.source";
import { FfmpegFrameCapture } from "./infrastructure/video/ffmpeg.frame.capture";
import { OpenAIWhisperTranscriptionProvider } from "./infrastructure/openai/openai.transcription.provider";
import { TextGenerationProviderFactory } from "./infrastructure/providers/text-generation.provider.factory";
import { GoogleWebTranslator } from "./infrastructure/translation/google-web.translator";
import { JobCleanupCron } from "./infrastructure/cron/job-cleanup.cron";
import { SlideProcessingPipeline } from "./application/pipeline/slide.processing.pipeline";
import { createSlideProcessingSteps } from "./application/pipeline/slide.processing.steps";
import { JobRunner } from "./application/services/job.runner";
import { ProcessVideoUseCase } from "./application/use-cases/process-video.use-case";
import { GetVideoInfoUseCase } from "./application/use-cases/get-video-info.use-case";
import { GetJobStatusUseCase } from "./application/use-cases/get-job-status.use-case";
import { ListJobsUseCase } from "./application/use-cases/list-jobs.use-case";
import { CancelJobUseCase } from "./application/use-cases/cancel-job.use-case";
import { DeleteJobUseCase } from "./application/use-cases/delete-job.use-case";
import { GetArtifactUseCase } from "./application/use-cases/get-artifact.use-case";
import { CleanupExpiredJobsUseCase } from "./application/use-cases/cleanup-expired-jobs.use-case";
import { VideoController } from "./presentation/controllers/video.controller";
import { JobController } from "./presentation/controllers/job.controller";
import { createVideoRoutes } from "./presentation/routes/video.routes";
import { createJobRoutes } from "./presentation/routes/job.routes";
import { errorHandler } from "./presentation/middleware/error.middleware";
import { IJobStore } from "./domain/interfaces/ijob.store";
import { IArtifactStorage } from "./domain/interfaces/iartifact.storage";

let jobCleanupCron: JobCleanupCron | null = null;

async function createJobStore(): Promise<IJobStore> {
  if (config.jobStore === "mongodb") {
    const db = await connectToMongoDB(config.mongodb);
    return new MongoJobRepository(db, config.pipeline.jobHistoryMaxEntries);
  }
  console.log("Using in-memory job store (jobs are lost on restart)");
  return new InMemoryJobStore(config.pipeline.jobHistoryMaxEntries);
}

function createArtifactStorage(): IArtifactStorage {
  if (config.storage.driver === "s3" && config.aws.s3Bucket) {
    const { accessKeyId, secretAccessKey } = config.aws;
    return new S3ArtifactStorage({
      bucket: config.aws.s3Bucket,
      region: config.aws.region,
      credentials: accessKeyId && secretAccessKey ? { accessKeyId, secretAccessKey } : undefined,
      endpoint: config.aws.s3Endpoint,
      forcePathStyle: config.aws.s3ForcePathStyle,
    });
  }
  return new LocalArtifactStorage(config.storage.dir);
}

async function main() {
  try {
    const jobStore = await createJobStore();
    const storage = createArtifactStorage();

    // Initialize infrastructure
    const videoSource = new YtDlpVideoSource({ ytDlpPath: config.tools.ytDlpPath, workDir: config.storage.workDir });
    const subtitleSource = new YtDlpSubtitleSource(config.tools.ytDlpPath);
    const frameCapture = new FfmpegFrameCapture({ ffmpegPath: config.tools.ffmpegPath });
    const transcriptionProvider = new OpenAIWhisperTranscriptionProvider({
      apiKey: config.ai.openaiApiKey,
      ffmpegPath: config.tools.ffmpegPath,
    });
    const providerFactory = new TextGenerationProviderFactory(config.ai);
    const machineTranslator = new GoogleWebTranslator();

    // Pipeline and background runner
    const steps = createSlideProcessingSteps(
      { videoSource, subtitleSource, frameCapture, transcriptionProvider, providerFactory, machineTranslator, storage },
      config.pipeline
    );
    const pipeline = new SlideProcessingPipeline(steps, jobStore, {
      onSettled: async (context) => {
        if (context.videoHandle) {
          await videoSource.release(context.videoHandle);
        }
      },
    });
    const jobRunner = new JobRunner(pipeline, config.pipeline.maxConcurrentJobs);

    // Use cases
    const processVideoUseCase = new ProcessVideoUseCase(jobStore, jobRunner);
    const getVideoInfoUseCase = new GetVideoInfoUseCase(videoSource, config.pipeline.fetchTimeoutMs);
    const getJobStatusUseCase = new GetJobStatusUseCase(jobStore);
    const listJobsUseCase = new ListJobsUseCase(jobStore);
    const cancelJobUseCase = new CancelJobUseCase(jobStore);
    const deleteJobUseCase = new DeleteJobUseCase(jobStore, storage);
    const getArtifactUseCase = new GetArtifactUseCase(jobStore, storage);
    const cleanupExpiredJobsUseCase = new CleanupExpiredJobsUseCase(jobStore, storage, config.pipeline.jobRetentionHours);

    // Controllers
    const videoController = new VideoController(getVideoInfoUseCase, processVideoUseCase, providerFactory);
    const jobController = new JobController(
      listJobsUseCase,
      getJobStatusUseCase,
      cancelJobUseCase,
      deleteJobUseCase,
      getArtifactUseCase
    );

    // Initialize Express app
    const app = express();

    // Enable CORS for all origins
    app.use(cors());
    app.use(express.json({ limit: "1mb" }));

    app.get("/health", (req, res) => {
      res.json({
        status: "ok",
        timestamp: new Date().toISOString(),
        activeJobs: jobRunner.activeCount,
        waitingJobs: jobRunner.waitingCount,
      });
    });

    // Routes
    app.use("/api/video", createVideoRoutes(videoController));
    app.use("/api/jobs", createJobRoutes(jobController));
    app.get("/api/languages", (req, res) => videoController.listLanguages(req, res));
    app.get("/api/ai-providers", (req, res) => videoController.listAiProviders(req, res));

    app.use(errorHandler);

    jobCleanupCron = new JobCleanupCron(cleanupExpiredJobsUseCase);
    jobCleanupCron.start();

    app.listen(config.port, () => {
      console.log(`Video slides service running on port ${config.port}`);
      console.log(`Health check: http://localhost:${config.port}/health`);
      console.log(`API endpoints: http://localhost:${config.port}/api/video, http://localhost:${config.port}/api/jobs`);
    });
  } catch (error) {
    console.error("Failed to start server:", error);
    process.exit(1);
  }
}

async function shutdown(signal: string): Promise<void> {
  console.log(`${signal} received, shutting down gracefully`);
  if (jobCleanupCron) {
    jobCleanupCron.stop();
  }
  await closeMongoDBConnection();
  process.exit(0);
}

process.on("SIGTERM", () => {
  void shutdown("SIGTERM");
});

process.on("SIGINT", () => {
  void shutdown("SIGINT");
});

void main();
