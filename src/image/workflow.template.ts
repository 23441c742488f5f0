import { JobDescription } from './image.types';

/** Node whose `text` input receives the user's prompt. */
export const POSITIVE_PROMPT_NODE_ID = '6';

/** SaveImage node whose output the pipeline waits for. */
export const OUTPUT_NODE_ID = '9';

export const DEFAULT_CHECKPOINT = 'flux1-dev-fp8.safetensors';

export interface WorkflowOptions {
  checkpoint?: string;
}

/**
 * Build the text-to-image graph for a prompt.
 *
 *   4 CheckpointLoaderSimple
 *   6 CLIPTextEncode(prompt, clip 4)      7 CLIPTextEncode(negative, clip 4)
 *   5 EmptyLatentImage
 *   3 KSampler(model 4, positive 6, negative 7, latent 5)
 *   8 VAEDecode(samples 3, vae 4)
 *   9 SaveImage(images 8)
 *
 * Only the positive prompt text and the checkpoint name vary. A fresh graph is
 * returned on every call.
 */
export function buildTextToImageWorkflow(
  prompt: string,
  options: WorkflowOptions = {},
): JobDescription {
  return {
    '3': {
      class_type: 'KSampler',
      inputs: {
        seed: 359819880975166,
        steps: 15,
        cfg: 1,
        sampler_name: 'euler',
        scheduler: 'normal',
        denoise: 1,
        model: ['4', 0],
        positive: [POSITIVE_PROMPT_NODE_ID, 0],
        negative: ['7', 0],
        latent_image: ['5', 0],
      },
    },
    '4': {
      class_type: 'CheckpointLoaderSimple',
      inputs: {
        ckpt_name: options.checkpoint ?? DEFAULT_CHECKPOINT,
      },
    },
    '5': {
      class_type: 'EmptyLatentImage',
      inputs: {
        width: 512,
        height: 512,
        batch_size: 1,
      },
    },
    [POSITIVE_PROMPT_NODE_ID]: {
      class_type: 'CLIPTextEncode',
      inputs: {
        text: prompt,
        clip: ['4', 1],
      },
    },
    '7': {
      class_type: 'CLIPTextEncode',
      inputs: {
        text: 'text, watermark',
        clip: ['4', 1],
      },
    },
    '8': {
      class_type: 'VAEDecode',
      inputs: {
        samples: ['3', 0],
        vae: ['4', 2],
      },
    },
    [OUTPUT_NODE_ID]: {
      class_type: 'SaveImage',
      inputs: {
        filename_prefix: 'ComfyUI',
        images: ['8', 0],
      },
    },
  };
}
