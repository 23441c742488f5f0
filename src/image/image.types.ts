import { ImageJobFailureKind } from './image-job.errors';

/**
 * A link to another node's output: `[nodeId, outputSlot]`.
 */
export type NodeLink = [nodeId: string, outputSlot: number];

export type NodeInput = string | number | boolean | NodeLink;

/**
 * One node of a synthesis graph.
 */
export interface WorkflowNode {
  class_type: string;
  inputs: Record<string, NodeInput>;
}

/**
 * Graph submitted to the image backend, keyed by node id.
 */
export type JobDescription = Record<string, WorkflowNode>;

/**
 * Handle returned by the backend for a queued job.
 */
export interface JobHandle {
  promptId: string;
}

/**
 * Image result for the output node, classified once when the ledger is read.
 */
export type ImagePayload =
  | { kind: 'InlineBase64'; data: string }
  | { kind: 'FileReference'; filename: string; subfolder: string; type?: string }
  | { kind: 'Unrecognized'; raw: unknown };

/**
 * Poll settings for {@link ImageJobPipeline.awaitResult}.
 */
export interface PollOptions {
  pollIntervalMs: number;
  timeoutMs: number;
}

/**
 * Outcome of a full generate run. Failures keep their kind for logging; the
 * caller decides what the user sees.
 */
export type GenerateImageResult =
  | { ok: true; bytes: Buffer; promptId: string }
  | { ok: false; failure: ImageJobFailureKind; message: string };
