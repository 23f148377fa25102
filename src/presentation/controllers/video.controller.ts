import { Request, Response } from "express";
import { GetVideoInfoUseCase } from "../../application/use-cases/get-video-info.use-case";
import { ProcessVideoUseCase } from "../../application/use-cases/process-video.use-case";
import { ITextGenerationProviderFactory } from "../../domain/interfaces/itext.generation.provider.factory";
import { LANGUAGE_NAMES } from "../../domain/utils/language-names";
import { parseProcessVideoRequest, parseVideoInfoRequest, ProcessVideoResponse } from "../dto/process-video.dto";
import { sendError } from "../middleware/error.middleware";

export class VideoController {
  constructor(
    private getVideoInfoUseCase: GetVideoInfoUseCase,
    private processVideoUseCase: ProcessVideoUseCase,
    private providerFactory: ITextGenerationProviderFactory
  ) {}

  async getVideoInfo(req: Request, res: Response): Promise<void> {
    const parsed = parseVideoInfoRequest(req.body);
    if (!parsed.ok) {
      res.status(400).json({ error: parsed.error });
      return;
    }

    try {
      const metadata = await this.getVideoInfoUseCase.execute(parsed.value.url);
      res.status(200).json(metadata);
    } catch (error) {
      sendError(res, error, "Failed to read video info");
    }
  }

  async processVideo(req: Request, res: Response): Promise<void> {
    const parsed = parseProcessVideoRequest(req.body);
    if (!parsed.ok) {
      res.status(400).json({ error: parsed.error });
      return;
    }

    try {
      const job = await this.processVideoUseCase.execute(parsed.value);
      const response: ProcessVideoResponse = {
        jobId: job.id,
        status: job.status,
        message: "Processing started",
      };
      res.status(202).json(response);
    } catch (error) {
      sendError(res, error, "Failed to start processing");
    }
  }

  listLanguages(_req: Request, res: Response): void {
    const languages = Object.entries(LANGUAGE_NAMES).map(([code, name]) => ({ code, name }));
    res.status(200).json({ languages });
  }

  listAiProviders(_req: Request, res: Response): void {
    res.status(200).json({ providers: this.providerFactory.describe() });
  }
}
