import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ComfyUiClient } from './comfyui.client';
import { ImageController } from './image.controller';
import { ImageJobPipeline } from './image-job.pipeline';

/**
 * Image Module for text-to-image generation via ComfyUI.
 *
 * Components:
 * - ImageController: HTTP endpoint returning generated PNGs
 * - ImageJobPipeline: submit, poll and extract for one job
 * - ComfyUiClient: HTTP client for the ComfyUI API
 */
@Module({
  imports: [ConfigModule],
  controllers: [ImageController],
  providers: [ImageJobPipeline, ComfyUiClient],
  exports: [ImageJobPipeline],
})
export class ImageModule {}
