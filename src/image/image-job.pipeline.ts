import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { sleep } from '../common/sleep';
import { ComfyUiClient } from './comfyui.client';
import { ImageJobError, ImageJobFailureKind } from './image-job.errors';
import {
  LedgerEntry,
  SubmitResponseSchema,
  classifyNodeOutput,
  decodeInlineBase64,
  readLedgerEntry,
} from './image-payload';
import {
  GenerateImageResult,
  ImagePayload,
  JobHandle,
  PollOptions,
} from './image.types';
import { OUTPUT_NODE_ID, buildTextToImageWorkflow } from './workflow.template';

/**
 * Runs one text-to-image job against the ComfyUI backend.
 *
 * Per job: Submitted -> Polling -> Ready -> Extracting -> BytesAvailable,
 * with any step able to end in a classified {@link ImageJobError}. Failed jobs
 * are never resubmitted and nothing is retried except the result poll, which
 * is a wait rather than a retry.
 *
 * The pipeline keeps no per-job state, so concurrent jobs are independent.
 */
@Injectable()
export class ImageJobPipeline {
  private readonly logger = new Logger(ImageJobPipeline.name);
  private readonly pollOptions: PollOptions;
  private readonly checkpoint: string;

  constructor(
    private readonly comfyUiClient: ComfyUiClient,
    private readonly configService: ConfigService,
  ) {
    this.pollOptions = {
      pollIntervalMs: this.configService.get<number>(
        'IMAGE_POLL_INTERVAL_MS',
        1000,
      ),
      timeoutMs: this.configService.get<number>('IMAGE_POLL_TIMEOUT_MS', 120000),
    };
    this.checkpoint = this.configService.get<string>(
      'COMFYUI_CHECKPOINT',
      'flux1-dev-fp8.safetensors',
    );
  }

  /**
   * Submit, wait for and extract one image.
   *
   * Never throws an {@link ImageJobError}: every job failure comes back as
   * `{ ok: false, failure }` and is logged with its kind.
   */
  async generate(
    promptText: string,
    signal?: AbortSignal,
  ): Promise<GenerateImageResult> {
    let promptId: string | undefined;
    try {
      const handle = await this.submit(promptText, signal);
      promptId = handle.promptId;
      this.logger.log(`Image job ${promptId} submitted`);

      const payload = await this.awaitResult(handle, this.pollOptions, signal);
      const bytes = await this.extractBytes(payload, signal);

      this.logger.log(`Image job ${promptId} produced ${bytes.length} bytes`);
      return { ok: true, bytes, promptId };
    } catch (error) {
      if (!(error instanceof ImageJobError)) {
        throw error;
      }
      const job = promptId ? `Image job ${promptId}` : 'Image job';
      this.logger.error(`${job} failed: ${JSON.stringify(error)}`);
      return { ok: false, failure: error.kind, message: error.message };
    }
  }

  /**
   * Queue the text-to-image graph for `promptText`.
   *
   * @throws ImageJobError BackendUnavailable on transport failure,
   *   BackendRejected on a non-success status or a body without `prompt_id`
   */
  async submit(promptText: string, signal?: AbortSignal): Promise<JobHandle> {
    this.throwIfCancelled(signal);
    const workflow = buildTextToImageWorkflow(promptText, {
      checkpoint: this.checkpoint,
    });

    let response: Response;
    try {
      response = await this.comfyUiClient.submitPrompt(workflow, signal);
    } catch (error) {
      throw this.transportFailure(
        'BackendUnavailable',
        'Job submission failed',
        error,
        signal,
      );
    }

    if (!response.ok) {
      throw new ImageJobError(
        'BackendRejected',
        `Job submission returned status ${response.status}`,
        { status: response.status },
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      this.throwIfCancelled(signal, error);
      body = undefined;
    }
    const parsed = SubmitResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ImageJobError(
        'BackendRejected',
        'Job submission response had no prompt_id',
        { body },
      );
    }
    return { promptId: parsed.data.prompt_id };
  }

  /**
   * Poll the result ledger until the output node has a result.
   *
   * The job counts as ready only once its outputs contain the image node;
   * an entry for the job alone is not enough. Gives up with Timeout once
   * `timeoutMs` has passed, and with Cancelled as soon as `signal` aborts.
   * A probe still in flight at the deadline is aborted.
   *
   * @throws ImageJobError Timeout, BackendUnavailable or Cancelled
   */
  async awaitResult(
    handle: JobHandle,
    options: PollOptions = this.pollOptions,
    signal?: AbortSignal,
  ): Promise<ImagePayload> {
    const startedAt = Date.now();
    const deadline = startedAt + options.timeoutMs;
    let polls = 0;

    const timedOut = () =>
      new ImageJobError('Timeout', `No result after ${options.timeoutMs}ms`, {
        promptId: handle.promptId,
        polls,
        elapsedMs: Date.now() - startedAt,
      });

    const budget = new AbortController();
    const budgetTimer = setTimeout(() => budget.abort(), options.timeoutMs);
    const probeSignal = signal
      ? AbortSignal.any([signal, budget.signal])
      : budget.signal;

    try {
      do {
        this.throwIfCancelled(signal);
        polls++;

        let entry: LedgerEntry | undefined;
        try {
          entry = await this.probe(handle, probeSignal, signal);
        } catch (error) {
          if (budget.signal.aborted && !signal?.aborted) {
            throw timedOut();
          }
          throw error;
        }

        if (entry && OUTPUT_NODE_ID in entry.outputs) {
          this.logger.debug(
            `Image job ${handle.promptId} ready after ${polls} poll(s)`,
          );
          return classifyNodeOutput(entry.outputs[OUTPUT_NODE_ID]);
        }

        const remaining = deadline - Date.now();
        if (remaining > 0) {
          try {
            await sleep(Math.min(options.pollIntervalMs, remaining), signal);
          } catch (error) {
            throw new ImageJobError(
              'Cancelled',
              'Image job cancelled by caller',
              { promptId: handle.promptId, polls },
              { cause: error },
            );
          }
        }
      } while (Date.now() < deadline);
    } finally {
      clearTimeout(budgetTimer);
    }

    throw timedOut();
  }

  /**
   * Turn a classified payload into image bytes.
   *
   * @throws ImageJobError MalformedPayload for bad base64 or an unknown
   *   shape, RetrievalFailed when a file reference cannot be downloaded
   */
  async extractBytes(
    payload: ImagePayload,
    signal?: AbortSignal,
  ): Promise<Buffer> {
    switch (payload.kind) {
      case 'InlineBase64': {
        const bytes = decodeInlineBase64(payload.data);
        if (!bytes) {
          throw new ImageJobError(
            'MalformedPayload',
            'Inline image data is not valid base64',
          );
        }
        return bytes;
      }

      case 'FileReference':
        return this.retrieveFile(payload, signal);

      case 'Unrecognized':
        throw new ImageJobError(
          'MalformedPayload',
          'Unexpected image data format',
          { payload: payload.raw },
        );

      default: {
        const unhandled: never = payload;
        throw new Error(`Unhandled payload ${JSON.stringify(unhandled)}`);
      }
    }
  }

  /**
   * One history request. `probeSignal` bounds the request; `signal` is the
   * caller's own and decides whether an abort counts as Cancelled.
   */
  private async probe(
    handle: JobHandle,
    probeSignal: AbortSignal,
    signal?: AbortSignal,
  ): Promise<LedgerEntry | undefined> {
    let response: Response;
    try {
      response = await this.comfyUiClient.fetchHistory(
        handle.promptId,
        probeSignal,
      );
    } catch (error) {
      throw this.transportFailure(
        'BackendUnavailable',
        'Result poll failed',
        error,
        signal,
      );
    }

    if (!response.ok) {
      this.logger.debug(
        `History for ${handle.promptId} returned status ${response.status}`,
      );
      return undefined;
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      this.throwIfCancelled(signal, error);
      return undefined;
    }
    return readLedgerEntry(body, handle.promptId);
  }

  private async retrieveFile(
    ref: Extract<ImagePayload, { kind: 'FileReference' }>,
    signal?: AbortSignal,
  ): Promise<Buffer> {
    const context = { filename: ref.filename, subfolder: ref.subfolder };

    let response: Response;
    try {
      response = await this.comfyUiClient.fetchImage(ref, signal);
    } catch (error) {
      throw this.transportFailure(
        'RetrievalFailed',
        'Image download failed',
        error,
        signal,
      );
    }

    if (!response.ok) {
      throw new ImageJobError(
        'RetrievalFailed',
        `Failed to retrieve image from server: ${response.status}`,
        { ...context, status: response.status },
      );
    }

    try {
      return Buffer.from(await response.arrayBuffer());
    } catch (error) {
      throw this.transportFailure(
        'RetrievalFailed',
        'Image download was interrupted',
        error,
        signal,
      );
    }
  }

  private throwIfCancelled(signal?: AbortSignal, cause?: unknown): void {
    if (signal?.aborted) {
      throw new ImageJobError(
        'Cancelled',
        'Image job cancelled by caller',
        {},
        { cause },
      );
    }
  }

  /**
   * Classify a thrown transport error. An abort from the caller's signal
   * always wins over the step's own failure kind.
   */
  private transportFailure(
    kind: ImageJobFailureKind,
    message: string,
    error: unknown,
    signal?: AbortSignal,
  ): ImageJobError {
    if (signal?.aborted) {
      return new ImageJobError('Cancelled', 'Image job cancelled by caller', {}, {
        cause: error,
      });
    }
    const reason = error instanceof Error ? error.message : String(error);
    return new ImageJobError(kind, `${message}: ${reason}`, {}, { cause: error });
  }
}
