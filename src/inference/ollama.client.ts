import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Ollama } from '@langchain/ollama';
import { z } from 'zod';
import { InferenceError } from './inference.errors';

/**
 * Response from the Ollama model listing endpoint.
 */
const TagsResponseSchema = z.object({
  models: z.array(z.object({ name: z.string() })).default([]),
});

/**
 * Client for the local Ollama server.
 *
 * Text generation goes through LangChain's `Ollama` completion model, which
 * posts `{ model, prompt }` to `/api/generate`. Model listing is a plain
 * HTTP call to `/api/tags`.
 */
@Injectable()
export class OllamaClient {
  private readonly logger = new Logger(OllamaClient.name);
  private readonly baseUrl: string;
  private readonly modelName: string;
  private model: Ollama | null = null;

  constructor(private readonly configService: ConfigService) {
    this.baseUrl = this.configService
      .get<string>('OLLAMA_BASE_URL', 'http://localhost:11434')
      .replace(/\/+$/, '');
    this.modelName = this.configService.get<string>('OLLAMA_MODEL', 'llama3.1');
    this.logger.log(
      `OllamaClient configured with model ${this.modelName} at ${this.baseUrl}`,
    );
  }

  private getModel(): Ollama {
    if (!this.model) {
      this.model = new Ollama({
        baseUrl: this.baseUrl,
        model: this.modelName,
      });
    }
    return this.model;
  }

  /**
   * Run one completion for the given prompt.
   *
   * @throws InferenceError when the server cannot be reached or fails
   */
  async generate(prompt: string): Promise<string> {
    this.logger.debug(`Generating with ${prompt.length} prompt characters`);
    try {
      return await this.getModel().invoke(prompt);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error(`Error generating response: ${reason}`);
      throw new InferenceError(`Generation failed: ${reason}`, undefined, {
        cause: error,
      });
    }
  }

  /**
   * List the names of the models installed on the server.
   *
   * @throws InferenceError on a transport failure or non-2xx status
   */
  async listModels(): Promise<string[]> {
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/api/tags`);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error(`Error listing models: ${reason}`);
      throw new InferenceError(`Model listing failed: ${reason}`, undefined, {
        cause: error,
      });
    }

    if (!response.ok) {
      this.logger.error(`Model listing returned status ${response.status}`);
      throw new InferenceError(
        `Model listing failed with status ${response.status}`,
        response.status,
      );
    }

    const body: unknown = await response.json().catch(() => undefined);
    const parsed = TagsResponseSchema.safeParse(body);
    if (!parsed.success) {
      this.logger.error(`Unexpected model listing body: ${parsed.error.message}`);
      throw new InferenceError('Model listing returned an unexpected body');
    }
    return parsed.data.models.map((model) => model.name);
  }
}
