import {
  Body,
  Controller,
  HttpCode,
  HttpException,
  HttpStatus,
  Logger,
  Post,
  Res,
  StreamableFile,
} from '@nestjs/common';
import { ImageJobPipeline } from './image-job.pipeline';
import { ImageRequestDto, ImageRequestSchema } from './dto/image-request.dto';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe';

export const IMAGE_FAILURE_MESSAGE =
  "Sorry, I couldn't generate an image at this time.";

/**
 * The parts of the HTTP response used to notice the client going away.
 */
export interface ClientConnection {
  once(event: 'close', listener: () => void): unknown;
  readonly writableEnded: boolean;
}

/**
 * Image Controller for text-to-image generation.
 *
 * Endpoints:
 * - POST /image: Generate a PNG from a prompt
 */
@Controller('image')
export class ImageController {
  private readonly logger = new Logger(ImageController.name);

  constructor(private readonly imageJobPipeline: ImageJobPipeline) {}

  /**
   * Generate an image and return it as `image/png`.
   *
   * If the client disconnects first, the job's polling stops. Every failure
   * kind maps to the same 502 message; the kind itself is only logged.
   */
  @Post()
  @HttpCode(HttpStatus.OK)
  async generate(
    @Body(new ZodValidationPipe(ImageRequestSchema)) body: ImageRequestDto,
    @Res({ passthrough: true }) connection: ClientConnection,
  ): Promise<StreamableFile> {
    this.logger.log(`Image request received (${body.prompt.length} chars)`);

    const abort = new AbortController();
    connection.once('close', () => {
      if (!connection.writableEnded) {
        this.logger.warn('Client disconnected, cancelling image job');
        abort.abort();
      }
    });

    const result = await this.imageJobPipeline.generate(
      body.prompt,
      abort.signal,
    );

    if (!result.ok) {
      this.logger.warn(`Image request failed with ${result.failure}`);
      throw new HttpException(IMAGE_FAILURE_MESSAGE, HttpStatus.BAD_GATEWAY);
    }

    return new StreamableFile(result.bytes, {
      type: 'image/png',
      disposition: 'inline; filename="generated_image.png"',
      length: result.bytes.length,
    });
  }
}
