import { Router } from "express";
import { JobController } from "../controllers/job.controller";

export function createJobRoutes(jobController: JobController): Router {
  const router = Router();

  router.get("/", (req, res) => jobController.listJobs(req, res));
  router.get("/:jobId", (req, res) => jobController.getJob(req, res));
  router.post("/:jobId/cancel", (req, res) => jobController.cancelJob(req, res));
  router.delete("/:jobId", (req, res) => jobController.deleteJob(req, res));
  router.get("/:jobId/artifacts/:name", (req, res) => jobController.getArtifact(req, res));

  return router;
}
