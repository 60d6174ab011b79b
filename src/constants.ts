export const rawExtensions = [
  ".nef",
  ".arw",
  ".cr2",
  ".cr3",
  ".dng",
  ".orf",
  ".rw2",
  ".raf",
] as const;

export const jpgExtensions = [".jpg", ".jpeg"] as const;

export const photoExtensions = [
  ...jpgExtensions,
  ".png",
  ".gif",
  ".bmp",
  ".tif",
  ".tiff",
  ".webp",
  ".heic",
  ".heif",
  ...rawExtensions,
] as const;

export const videoExtensions = [
  ".mp4",
  ".mov",
  ".m4v",
  ".avi",
  ".mkv",
  ".3gp",
  ".mts",
  ".m2ts",
] as const;

export const mediaExtensions = [...photoExtensions, ...videoExtensions] as const;

export const defaultDateFormat = "yyyy/MM/dd";
export const defaultUnknownDateDir = "unknown-date";
export const defaultConcurrency = 4;
export const maxCollisionSuffix = 9999;
