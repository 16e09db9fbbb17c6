export const PNG_MIME_TYPE = 'image/png';

export interface RenderedImage {
  readonly data: Buffer;
  readonly mimeType: typeof PNG_MIME_TYPE;
  readonly width: number;
  readonly height: number;
}
