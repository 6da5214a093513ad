export const ALLOWED_MIME_TYPES = [
  'image/jpeg',
  'image/png',
  'image/gif',
  'image/webp',
] as const;

export type AllowedMimeType = (typeof ALLOWED_MIME_TYPES)[number];

export const MAX_FILE_SIZE_BYTES = 10 * 1024 * 1024;

export const UNSUPPORTED_TYPE_MESSAGE =
  'File type not supported. Please upload JPEG, PNG, GIF, or WebP images.';
export const FILE_TOO_LARGE_MESSAGE = 'File size exceeds maximum allowed size of 10MB';
export const EMPTY_FILE_MESSAGE = 'File is empty';

export interface UploadCandidate {
  fileName: string;
  mimeType: string | null | undefined;
  size: number;
  data: Buffer;
}

export type UploadValidationResult =
  | { valid: true; mimeType: AllowedMimeType }
  | { valid: false; reason: string };

export const isAllowedMimeType = (
  value: string | null | undefined,
): value is AllowedMimeType =>
  ALLOWED_MIME_TYPES.some((type) => type === value);

/**
 * Checks run in order: MIME type, emptiness, size. The first failure wins.
 */
export function validateUpload(candidate: UploadCandidate): UploadValidationResult {
  const mimeType = candidate.mimeType?.trim().toLowerCase();

  if (!isAllowedMimeType(mimeType)) {
    return { valid: false, reason: UNSUPPORTED_TYPE_MESSAGE };
  }

  if (candidate.size === 0 || candidate.data.length === 0) {
    return { valid: false, reason: EMPTY_FILE_MESSAGE };
  }

  if (candidate.size > MAX_FILE_SIZE_BYTES || candidate.data.length > MAX_FILE_SIZE_BYTES) {
    return { valid: false, reason: FILE_TOO_LARGE_MESSAGE };
  }

  return { valid: true, mimeType };
}
