import {Buffer} from 'node:buffer';
import {z} from 'genkit';

export const IMAGE_CONTENT_TYPES = ['image/jpeg', 'image/png'] as const;

export type ImageContentType = (typeof IMAGE_CONTENT_TYPES)[number];

/** A still image as a base64 data URI, the form Genkit media parts take. */
export type ImageInput = {
  url: string;
  contentType: ImageContentType;
};

export const ImageContentTypeSchema = z.enum(IMAGE_CONTENT_TYPES);

const DATA_URI_PATTERN = /^data:([a-z]+\/[a-z0-9.+-]+);base64,([A-Za-z0-9+/]+={0,2})$/i;

export function imageFromBytes(bytes: Uint8Array, contentType: ImageContentType): ImageInput {
  const base64 = Buffer.from(bytes).toString('base64');
  return {url: `data:${contentType};base64,${base64}`, contentType};
}

/**
 * Parses a `data:<mime>;base64,<data>` URI into an image input.
 * Returns null for anything that is not a non-empty JPEG or PNG payload.
 */
export function imageFromDataUri(dataUri: string): ImageInput | null {
  const match = DATA_URI_PATTERN.exec(dataUri.trim());
  if (!match) return null;
  const contentType = ImageContentTypeSchema.safeParse(match[1].toLowerCase());
  if (!contentType.success) return null;
  return {url: `data:${contentType.data};base64,${match[2]}`, contentType: contentType.data};
}
