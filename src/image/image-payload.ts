/**
 * Schemas for image backend responses.
 *
 * The backend's JSON is untrusted: every body is parsed here and turned into
 * typed values once, so the pipeline never inspects raw shapes itself.
 */
import { z } from 'zod';
import { ImagePayload } from './image.types';

export const SubmitResponseSchema = z.object({
  prompt_id: z.string().min(1),
});

export const LedgerEntrySchema = z.object({
  outputs: z.record(z.string(), z.unknown()),
});

export type LedgerEntry = z.infer<typeof LedgerEntrySchema>;

const NodeOutputSchema = z.object({
  images: z.array(z.unknown()).nonempty(),
});

const FileReferenceSchema = z.object({
  filename: z.string(),
  subfolder: z.string(),
  type: z.string().optional(),
});

const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;

/**
 * Find the ledger entry for a job in a `/history/{id}` body.
 *
 * Returns undefined while the job has no usable entry yet; the backend
 * answers `{}` until the job finishes.
 */
export function readLedgerEntry(
  body: unknown,
  promptId: string,
): LedgerEntry | undefined {
  const ledger = z.record(z.string(), z.unknown()).safeParse(body);
  if (!ledger.success || !(promptId in ledger.data)) {
    return undefined;
  }
  const entry = LedgerEntrySchema.safeParse(ledger.data[promptId]);
  return entry.success ? entry.data : undefined;
}

/**
 * Classify a single image entry: inline base64 text, a server-side file
 * reference, or anything else.
 */
export function classifyImageEntry(entry: unknown): ImagePayload {
  if (typeof entry === 'string') {
    return { kind: 'InlineBase64', data: entry };
  }
  const fileRef = FileReferenceSchema.safeParse(entry);
  if (fileRef.success) {
    return { kind: 'FileReference', ...fileRef.data };
  }
  return { kind: 'Unrecognized', raw: entry };
}

/**
 * Classify the output of the image node from its first `images` entry.
 * Outputs without a non-empty `images` list are unrecognized.
 */
export function classifyNodeOutput(output: unknown): ImagePayload {
  const parsed = NodeOutputSchema.safeParse(output);
  if (!parsed.success) {
    return { kind: 'Unrecognized', raw: output };
  }
  return classifyImageEntry(parsed.data.images[0]);
}

/**
 * Decode inline base64 image data, dropping a data-URI header if present.
 *
 * Everything up to the first comma is treated as the header. Returns
 * undefined when the remainder is not valid base64.
 */
export function decodeInlineBase64(data: string): Buffer | undefined {
  const comma = data.indexOf(',');
  const encoded = (comma === -1 ? data : data.slice(comma + 1)).replace(
    /\s+/g,
    '',
  );
  if (encoded.length % 4 !== 0 || !BASE64_PATTERN.test(encoded)) {
    return undefined;
  }
  return Buffer.from(encoded, 'base64');
}
