/** Object storage folder avatars are written to */
export const AVATAR_FOLDER = 'avatars';

/** Default upper bound for an avatar upload, in kilobytes */
export const DEFAULT_AVATAR_MAX_SIZE_KB = 2048;

/**
 * The subset of a Multer file the avatar rules need.
 * `Express.Multer.File` satisfies it structurally.
 */
export interface UploadedImage {
  buffer: Buffer;
  originalname: string;
  mimetype: string;
  size: number;
}

type Signature = {
  mime: string;
  matches: (head: Buffer) => boolean;
};

const PNG_MAGIC = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

/**
 * Accepted image formats, recognized by content rather than by the
 * client-declared MIME type. Raster formats only; SVG is not accepted.
 */
const SIGNATURES: readonly Signature[] = [
  { mime: 'image/png', matches: (b) => b.subarray(0, 8).equals(PNG_MAGIC) },
  { mime: 'image/jpeg', matches: (b) => b[0] === 0xff && b[1] === 0xd8 && b[2] === 0xff },
  {
    mime: 'image/gif',
    matches: (b) => ['GIF87a', 'GIF89a'].includes(b.subarray(0, 6).toString('ascii')),
  },
  {
    mime: 'image/webp',
    matches: (b) =>
      b.subarray(0, 4).toString('ascii') === 'RIFF' &&
      b.subarray(8, 12).toString('ascii') === 'WEBP',
  },
  { mime: 'image/bmp', matches: (b) => b.subarray(0, 2).toString('ascii') === 'BM' },
];

/** Returns the detected image MIME type, or null when the bytes are not a supported image. */
export function detectImageType(buffer: Buffer): string | null {
  const match = SIGNATURES.find((signature) => signature.matches(buffer));
  return match ? match.mime : null;
}

/**
 * Checks an uploaded avatar against the image rules.
 * @returns the messages for the `avatar` field; empty when valid
 */
export function avatarViolations(file: UploadedImage, maxSizeKb: number): string[] {
  const violations: string[] = [];

  if (file.size === 0 || detectImageType(file.buffer) === null) {
    violations.push('The avatar field must be an image.');
  }

  if (file.size > maxSizeKb * 1024) {
    violations.push(`The avatar field must not be greater than ${maxSizeKb} kilobytes.`);
  }

  return violations;
}
