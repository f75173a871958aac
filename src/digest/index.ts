export { digestSchema, NO_MESSAGES_SENTINEL } from "./schema";
export type { Digest } from "./schema";

export { extractDigest } from "./extractor";
export type { ExtractionResult } from "./extractor";

export { generateDigest } from "./generator";
export type { GenerationOptions, GenerationResult } from "./generator";

export { writeArtifact, renderArtifact, defaultArtifactPath } from "./artifact";
export type { WriteResult } from "./artifact";

export { runDigestCycle } from "./orchestrator";
export type {
  DigestRequest,
  DigestPipeline,
  DigestRunReport,
  StepOutcome,
} from "./orchestrator";
