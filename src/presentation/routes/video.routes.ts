import { Router } from "express";
import { VideoController } from "../controllers/video.controller";

export function createVideoRoutes(videoController: VideoController): Router {
  const router = Router();

  // Probe metadata and available subtitle tracks
  router.post("/info", (req, res) => videoController.getVideoInfo(req, res));

  // Start a slide-deck job (202 with the job id)
  router.post("/process", (req, res) => videoController.processVideo(req, res));

  return router;
}
