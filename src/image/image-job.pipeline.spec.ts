/**
 * Unit tests for image-job.pipeline.ts
 *
 * The ComfyUI client is mocked; the poll loop runs on Jest fake timers so
 * timeouts are checked to the millisecond.
 */
import { Test, TestingModule } from '@nestjs/testing';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ImageJobPipeline } from './image-job.pipeline';
import { ComfyUiClient } from './comfyui.client';
import { ImageJobError } from './image-job.errors';
import { classifyImageEntry } from './image-payload';
import { ImagePayload } from './image.types';
import {
  bytesResponse,
  errorResponse,
  historyWithImages,
  jsonResponse,
} from './test-utils';

const PROMPT_ID = 'abc';
const POLL = { pollIntervalMs: 1000, timeoutMs: 5000 };

describe('ImageJobPipeline', () => {
  let pipeline: ImageJobPipeline;

  const mockClient = {
    submitPrompt: jest.fn(),
    fetchHistory: jest.fn(),
    fetchImage: jest.fn(),
  };

  const notReady = () => Promise.resolve(jsonResponse({}));

  /** A history request that only settles when its signal aborts. */
  const hangUntilAborted = (_promptId: string, signal: AbortSignal) =>
    new Promise<never>((_resolve, reject) => {
      signal.addEventListener('abort', () => reject(signal.reason), {
        once: true,
      });
    });

  beforeEach(async () => {
    jest.clearAllMocks();
    mockClient.submitPrompt.mockReset();
    mockClient.fetchHistory.mockReset();
    mockClient.fetchImage.mockReset();

    const configService: Partial<ConfigService> = {
      get: jest.fn((key: string, defaultValue?: unknown) => {
        const config: Record<string, unknown> = {
          IMAGE_POLL_INTERVAL_MS: POLL.pollIntervalMs,
          IMAGE_POLL_TIMEOUT_MS: POLL.timeoutMs,
          COMFYUI_CHECKPOINT: 'test-model.safetensors',
        };
        return config[key] ?? defaultValue;
      }),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ImageJobPipeline,
        { provide: ComfyUiClient, useValue: mockClient },
        { provide: ConfigService, useValue: configService },
      ],
    }).compile();

    pipeline = module.get<ImageJobPipeline>(ImageJobPipeline);
  });

  describe('submit', () => {
    it('should submit the workflow with the prompt and checkpoint', async () => {
      mockClient.submitPrompt.mockResolvedValueOnce(
        jsonResponse({ prompt_id: PROMPT_ID }),
      );

      await pipeline.submit('a lighthouse at dusk');

      expect(mockClient.submitPrompt).toHaveBeenCalledWith(
        expect.objectContaining({
          '4': {
            class_type: 'CheckpointLoaderSimple',
            inputs: { ckpt_name: 'test-model.safetensors' },
          },
          '6': {
            class_type: 'CLIPTextEncode',
            inputs: { text: 'a lighthouse at dusk', clip: ['4', 1] },
          },
        }),
        undefined,
      );
    });

    it('should return the job handle', async () => {
      mockClient.submitPrompt.mockResolvedValueOnce(
        jsonResponse({ prompt_id: PROMPT_ID, number: 3 }),
      );

      await expect(pipeline.submit('x')).resolves.toEqual({
        promptId: PROMPT_ID,
      });
    });

    it('should classify a non-success status as BackendRejected', async () => {
      mockClient.submitPrompt.mockResolvedValueOnce(
        jsonResponse({ error: 'invalid prompt' }, 400),
      );

      const pending = pipeline.submit('x');

      await expect(pending).rejects.toBeInstanceOf(ImageJobError);
      await expect(pending).rejects.toMatchObject({
        kind: 'BackendRejected',
        message: 'Job submission returned status 400',
      });
    });

    it('should classify a body without prompt_id as BackendRejected', async () => {
      mockClient.submitPrompt.mockResolvedValueOnce(jsonResponse({}));

      await expect(pipeline.submit('x')).rejects.toMatchObject({
        kind: 'BackendRejected',
        message: 'Job submission response had no prompt_id',
      });
    });

    it('should classify an unreadable body as BackendRejected', async () => {
      mockClient.submitPrompt.mockResolvedValueOnce(
        bytesResponse(Buffer.from('not json')),
      );

      await expect(pipeline.submit('x')).rejects.toMatchObject({
        kind: 'BackendRejected',
        message: 'Job submission response had no prompt_id',
      });
    });

    it('should report a body read cut short by the caller as Cancelled', async () => {
      const controller = new AbortController();
      mockClient.submitPrompt.mockResolvedValueOnce({
        ...jsonResponse({ prompt_id: PROMPT_ID }),
        json: () => {
          controller.abort();
          return Promise.reject(new Error('This operation was aborted'));
        },
      });

      await expect(
        pipeline.submit('x', controller.signal),
      ).rejects.toMatchObject({
        kind: 'Cancelled',
        message: 'Image job cancelled by caller',
      });
    });

    it('should classify a transport failure as BackendUnavailable', async () => {
      mockClient.submitPrompt.mockRejectedValueOnce(
        new TypeError('fetch failed'),
      );

      await expect(pipeline.submit('x')).rejects.toMatchObject({
        kind: 'BackendUnavailable',
        message: 'Job submission failed: fetch failed',
      });
    });
  });

  describe('awaitResult', () => {
    beforeEach(() => {
      jest.useFakeTimers({ doNotFake: ['nextTick', 'queueMicrotask'] });
    });

    afterEach(() => {
      jest.useRealTimers();
    });

    it('should return the payload once the output node is present', async () => {
      mockClient.fetchHistory
        .mockImplementationOnce(notReady)
        .mockResolvedValueOnce(
          jsonResponse(
            historyWithImages(PROMPT_ID, [{ filename: 'a.png', subfolder: 'x' }]),
          ),
        );

      const outcome = pipeline.awaitResult({ promptId: PROMPT_ID }, POLL);
      await jest.advanceTimersByTimeAsync(1000);

      await expect(outcome).resolves.toEqual({
        kind: 'FileReference',
        filename: 'a.png',
        subfolder: 'x',
      });
      expect(mockClient.fetchHistory).toHaveBeenCalledTimes(2);
      expect(mockClient.fetchHistory).toHaveBeenCalledWith(
        PROMPT_ID,
        expect.any(AbortSignal),
      );
    });

    it('should keep polling while the entry lacks the output node', async () => {
      mockClient.fetchHistory
        .mockResolvedValueOnce(
          jsonResponse({ [PROMPT_ID]: { outputs: { '8': { images: [] } } } }),
        )
        .mockResolvedValueOnce(
          jsonResponse(historyWithImages(PROMPT_ID, ['aGk='])),
        );

      const outcome = pipeline.awaitResult({ promptId: PROMPT_ID }, POLL);
      await jest.advanceTimersByTimeAsync(1000);

      await expect(outcome).resolves.toEqual({
        kind: 'InlineBase64',
        data: 'aGk=',
      });
      expect(mockClient.fetchHistory).toHaveBeenCalledTimes(2);
    });

    it('should treat an error status as not ready', async () => {
      mockClient.fetchHistory
        .mockResolvedValueOnce(errorResponse(500))
        .mockResolvedValueOnce(
          jsonResponse(historyWithImages(PROMPT_ID, ['aGk='])),
        );

      const outcome = pipeline.awaitResult({ promptId: PROMPT_ID }, POLL);
      await jest.advanceTimersByTimeAsync(1000);

      await expect(outcome).resolves.toEqual({
        kind: 'InlineBase64',
        data: 'aGk=',
      });
    });

    it('should not probe again before the poll interval has passed', async () => {
      mockClient.fetchHistory.mockImplementation(notReady);

      const outcome = pipeline
        .awaitResult({ promptId: PROMPT_ID }, POLL)
        .catch((error: unknown) => error);

      await jest.advanceTimersByTimeAsync(999);
      expect(mockClient.fetchHistory).toHaveBeenCalledTimes(1);

      await jest.advanceTimersByTimeAsync(1);
      expect(mockClient.fetchHistory).toHaveBeenCalledTimes(2);

      await jest.advanceTimersByTimeAsync(POLL.timeoutMs);
      await outcome;
    });

    it('should time out exactly when the budget is spent', async () => {
      mockClient.fetchHistory.mockImplementation(notReady);
      const startedAt = Date.now();
      let settledAt: number | undefined;

      const outcome = pipeline
        .awaitResult({ promptId: PROMPT_ID }, POLL)
        .catch((error: unknown) => {
          settledAt = Date.now();
          return error;
        });

      await jest.advanceTimersByTimeAsync(4999);
      expect(settledAt).toBeUndefined();

      await jest.advanceTimersByTimeAsync(1);
      const error = await outcome;

      expect(error).toBeInstanceOf(ImageJobError);
      expect(error).toMatchObject({
        kind: 'Timeout',
        message: 'No result after 5000ms',
        context: { promptId: PROMPT_ID, polls: 5, elapsedMs: 5000 },
      });
      expect(settledAt).toBe(startedAt + 5000);
      expect(mockClient.fetchHistory).toHaveBeenCalledTimes(5);
    });

    it('should shorten the last wait so it does not overrun the budget', async () => {
      mockClient.fetchHistory.mockImplementation(notReady);

      const outcome = pipeline
        .awaitResult(
          { promptId: PROMPT_ID },
          { pollIntervalMs: 2000, timeoutMs: 3000 },
        )
        .catch((error: unknown) => error);

      await jest.advanceTimersByTimeAsync(3000);

      await expect(outcome).resolves.toMatchObject({
        kind: 'Timeout',
        context: { polls: 2, elapsedMs: 3000 },
      });
    });

    it('should time out at the budget when a poll hangs', async () => {
      mockClient.fetchHistory
        .mockImplementationOnce(notReady)
        .mockImplementation(hangUntilAborted);
      const startedAt = Date.now();
      let settledAt: number | undefined;

      const outcome = pipeline
        .awaitResult({ promptId: PROMPT_ID }, POLL)
        .catch((error: unknown) => {
          settledAt = Date.now();
          return error;
        });

      await jest.advanceTimersByTimeAsync(4999);
      expect(settledAt).toBeUndefined();

      await jest.advanceTimersByTimeAsync(1);
      await expect(outcome).resolves.toMatchObject({
        kind: 'Timeout',
        message: 'No result after 5000ms',
        context: { promptId: PROMPT_ID, polls: 2, elapsedMs: 5000 },
      });
      expect(settledAt).toBe(startedAt + 5000);
      expect(jest.getTimerCount()).toBe(0);
    });

    it('should report a hung poll aborted by the caller as Cancelled', async () => {
      mockClient.fetchHistory.mockImplementation(hangUntilAborted);
      const controller = new AbortController();

      const outcome = pipeline
        .awaitResult({ promptId: PROMPT_ID }, POLL, controller.signal)
        .catch((error: unknown) => error);

      await jest.advanceTimersByTimeAsync(500);
      controller.abort();

      await expect(outcome).resolves.toMatchObject({ kind: 'Cancelled' });
      expect(jest.getTimerCount()).toBe(0);
    });

    it('should classify a transport failure on a poll as BackendUnavailable', async () => {
      mockClient.fetchHistory
        .mockImplementationOnce(notReady)
        .mockRejectedValueOnce(new TypeError('fetch failed'));

      const outcome = pipeline
        .awaitResult({ promptId: PROMPT_ID }, POLL)
        .catch((error: unknown) => error);
      await jest.advanceTimersByTimeAsync(1000);

      await expect(outcome).resolves.toMatchObject({
        kind: 'BackendUnavailable',
        message: 'Result poll failed: fetch failed',
      });
    });

    it('should stop polling promptly when cancelled', async () => {
      mockClient.fetchHistory.mockImplementation(notReady);
      const controller = new AbortController();

      const outcome = pipeline
        .awaitResult({ promptId: PROMPT_ID }, POLL, controller.signal)
        .catch((error: unknown) => error);

      await jest.advanceTimersByTimeAsync(2500);
      controller.abort();

      await expect(outcome).resolves.toMatchObject({ kind: 'Cancelled' });
      expect(mockClient.fetchHistory).toHaveBeenCalledTimes(3);

      await jest.advanceTimersByTimeAsync(POLL.timeoutMs);
      expect(mockClient.fetchHistory).toHaveBeenCalledTimes(3);
      expect(jest.getTimerCount()).toBe(0);
    });

    it('should not poll at all with an already aborted signal', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(
        pipeline.awaitResult({ promptId: PROMPT_ID }, POLL, controller.signal),
      ).rejects.toMatchObject({ kind: 'Cancelled' });
      expect(mockClient.fetchHistory).not.toHaveBeenCalled();
    });
  });

  describe('extractBytes', () => {
    it('should decode inline base64 after stripping the data-URI header', async () => {
      const bytes = await pipeline.extractBytes({
        kind: 'InlineBase64',
        data: 'data:image/png;base64,AAAA',
      });

      expect(bytes).toEqual(Buffer.from([0, 0, 0]));
    });

    it('should reject inline data that is not base64', async () => {
      await expect(
        pipeline.extractBytes({
          kind: 'InlineBase64',
          data: 'data:image/png;base64,%%%%',
        }),
      ).rejects.toMatchObject({
        kind: 'MalformedPayload',
        message: 'Inline image data is not valid base64',
      });
    });

    it('should download a file reference', async () => {
      const imageBytes = Buffer.from([0x89, 0x50, 0x4e, 0x47]);
      mockClient.fetchImage.mockResolvedValueOnce(bytesResponse(imageBytes));
      const payload: ImagePayload = {
        kind: 'FileReference',
        filename: 'a.png',
        subfolder: 'x',
      };

      const bytes = await pipeline.extractBytes(payload);

      expect(bytes).toEqual(imageBytes);
      expect(mockClient.fetchImage).toHaveBeenCalledWith(
        expect.objectContaining({ filename: 'a.png', subfolder: 'x' }),
        undefined,
      );
    });

    it('should classify a failed download status as RetrievalFailed', async () => {
      mockClient.fetchImage.mockResolvedValueOnce(errorResponse(404));

      await expect(
        pipeline.extractBytes({
          kind: 'FileReference',
          filename: 'a.png',
          subfolder: 'x',
        }),
      ).rejects.toMatchObject({
        kind: 'RetrievalFailed',
        message: 'Failed to retrieve image from server: 404',
        context: { filename: 'a.png', subfolder: 'x', status: 404 },
      });
    });

    it('should classify a download transport failure as RetrievalFailed', async () => {
      mockClient.fetchImage.mockRejectedValueOnce(
        new TypeError('fetch failed'),
      );

      await expect(
        pipeline.extractBytes({
          kind: 'FileReference',
          filename: 'a.png',
          subfolder: 'x',
        }),
      ).rejects.toMatchObject({ kind: 'RetrievalFailed' });
    });

    it('should reject a payload in neither recognized shape', async () => {
      await expect(
        pipeline.extractBytes(classifyImageEntry({ foo: 'bar' })),
      ).rejects.toMatchObject({
        kind: 'MalformedPayload',
        context: { payload: { foo: 'bar' } },
      });
    });
  });

  describe('generate', () => {
    beforeEach(() => {
      mockClient.submitPrompt.mockResolvedValue(
        jsonResponse({ prompt_id: PROMPT_ID }),
      );
    });

    it('should return the image bytes for a finished job', async () => {
      mockClient.fetchHistory.mockResolvedValueOnce(
        jsonResponse(
          historyWithImages(PROMPT_ID, ['data:image/png;base64,aGk=']),
        ),
      );

      await expect(pipeline.generate('a cat')).resolves.toEqual({
        ok: true,
        bytes: Buffer.from('hi'),
        promptId: PROMPT_ID,
      });
    });

    it('should fetch file references through the view endpoint', async () => {
      mockClient.fetchHistory.mockResolvedValueOnce(
        jsonResponse(
          historyWithImages(PROMPT_ID, [
            { filename: 'ComfyUI_00001_.png', subfolder: '', type: 'output' },
          ]),
        ),
      );
      mockClient.fetchImage.mockResolvedValueOnce(
        bytesResponse(Buffer.from('png-bytes')),
      );

      const result = await pipeline.generate('a cat');

      expect(result).toEqual({
        ok: true,
        bytes: Buffer.from('png-bytes'),
        promptId: PROMPT_ID,
      });
    });

    it('should report the first failure and stop', async () => {
      mockClient.submitPrompt.mockReset();
      mockClient.submitPrompt.mockResolvedValueOnce(errorResponse(500));

      await expect(pipeline.generate('a cat')).resolves.toEqual({
        ok: false,
        failure: 'BackendRejected',
        message: 'Job submission returned status 500',
      });
      expect(mockClient.fetchHistory).not.toHaveBeenCalled();
    });

    it('should log the failure with its kind and context', async () => {
      const errorSpy = jest
        .spyOn(Logger.prototype, 'error')
        .mockImplementation(() => undefined);
      mockClient.submitPrompt.mockReset();
      mockClient.submitPrompt.mockResolvedValueOnce(errorResponse(500));

      await pipeline.generate('a cat');

      expect(errorSpy).toHaveBeenCalledWith(
        'Image job failed: {"name":"ImageJobError","kind":"BackendRejected","message":"Job submission returned status 500","context":{"status":500}}',
      );
      errorSpy.mockRestore();
    });

    it('should report a malformed payload', async () => {
      mockClient.fetchHistory.mockResolvedValueOnce(
        jsonResponse(historyWithImages(PROMPT_ID, [{ foo: 'bar' }])),
      );

      await expect(pipeline.generate('a cat')).resolves.toMatchObject({
        ok: false,
        failure: 'MalformedPayload',
      });
    });

    it('should report a failed retrieval', async () => {
      mockClient.fetchHistory.mockResolvedValueOnce(
        jsonResponse(
          historyWithImages(PROMPT_ID, [{ filename: 'a.png', subfolder: 'x' }]),
        ),
      );
      mockClient.fetchImage.mockResolvedValueOnce(errorResponse(500));

      await expect(pipeline.generate('a cat')).resolves.toMatchObject({
        ok: false,
        failure: 'RetrievalFailed',
      });
    });

    describe('with fake timers', () => {
      beforeEach(() => {
        jest.useFakeTimers({ doNotFake: ['nextTick', 'queueMicrotask'] });
      });

      afterEach(() => {
        jest.useRealTimers();
      });

      it('should use the configured poll budget', async () => {
        mockClient.fetchHistory.mockImplementation(notReady);

        const outcome = pipeline.generate('a cat');
        await jest.advanceTimersByTimeAsync(POLL.timeoutMs);

        await expect(outcome).resolves.toEqual({
          ok: false,
          failure: 'Timeout',
          message: 'No result after 5000ms',
        });
      });

      it('should report cancellation', async () => {
        mockClient.fetchHistory.mockImplementation(notReady);
        const controller = new AbortController();

        const outcome = pipeline.generate('a cat', controller.signal);
        await jest.advanceTimersByTimeAsync(1500);
        controller.abort();

        await expect(outcome).resolves.toMatchObject({
          ok: false,
          failure: 'Cancelled',
        });
      });
    });
  });
});
