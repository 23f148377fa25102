import { describe, expect, it } from "vitest";
import {
  ArtifactNotFoundError,
  JobNotFoundError,
  JobStateConflictError,
  ValidationError,
} from "../src/domain/errors/job.errors";
import { FetchError, ProviderCallError } from "../src/domain/errors/pipeline.errors";
import { statusCodeFor } from "../src/presentation/middleware/error.middleware";

describe("statusCodeFor", () => {
  it("maps domain errors to HTTP statuses", () => {
    expect(statusCodeFor(new ValidationError("bad"))).toBe(400);
    expect(statusCodeFor(new JobNotFoundError("j1"))).toBe(404);
    expect(statusCodeFor(new ArtifactNotFoundError("j1", "result.json"))).toBe(404);
    expect(statusCodeFor(new JobStateConflictError("done"))).toBe(409);
    expect(statusCodeFor(new FetchError("unreachable"))).toBe(502);
    expect(statusCodeFor(new ProviderCallError("quota"))).toBe(500);
    expect(statusCodeFor("string failure")).toBe(500);
  });
});
