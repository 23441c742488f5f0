import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JobDescription } from './image.types';

/**
 * Location of an image saved by the backend.
 */
export interface ImageFileRef {
  filename: string;
  subfolder: string;
  type?: string;
}

/**
 * HTTP client for the ComfyUI image backend.
 *
 * Transport only: each method returns the raw response and lets fetch errors
 * propagate. Every call is bounded by the configured per-request timeout and
 * by the caller's signal, whichever fires first.
 */
@Injectable()
export class ComfyUiClient {
  private readonly logger = new Logger(ComfyUiClient.name);
  private readonly baseUrl: string;
  private readonly requestTimeoutMs: number;

  constructor(private readonly configService: ConfigService) {
    this.baseUrl = this.configService
      .get<string>('COMFYUI_API_URL', 'http://127.0.0.1:8188')
      .replace(/\/+$/, '');
    this.requestTimeoutMs = this.configService.get<number>(
      'COMFYUI_REQUEST_TIMEOUT_MS',
      30000,
    );
    this.logger.log(`ComfyUiClient configured with base URL: ${this.baseUrl}`);
  }

  /**
   * Queue a job. POST /prompt
   */
  async submitPrompt(
    prompt: JobDescription,
    signal?: AbortSignal,
  ): Promise<Response> {
    return this.send(
      `${this.baseUrl}/prompt`,
      {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({ prompt }),
      },
      signal,
    );
  }

  /**
   * Read the result ledger for one job. GET /history/{promptId}
   */
  async fetchHistory(
    promptId: string,
    signal?: AbortSignal,
  ): Promise<Response> {
    return this.send(
      `${this.baseUrl}/history/${encodeURIComponent(promptId)}`,
      { method: 'GET' },
      signal,
    );
  }

  /**
   * Download a saved image. GET /view?filename=&subfolder=
   */
  async fetchImage(ref: ImageFileRef, signal?: AbortSignal): Promise<Response> {
    const params = new URLSearchParams({
      filename: ref.filename,
      subfolder: ref.subfolder,
    });
    if (ref.type) {
      params.set('type', ref.type);
    }
    return this.send(
      `${this.baseUrl}/view?${params.toString()}`,
      { method: 'GET' },
      signal,
    );
  }

  private async send(
    url: string,
    init: RequestInit,
    signal?: AbortSignal,
  ): Promise<Response> {
    const timeout = AbortSignal.timeout(this.requestTimeoutMs);
    this.logger.debug(`${init.method ?? 'GET'} ${url}`);
    return fetch(url, {
      ...init,
      signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
    });
  }
}
