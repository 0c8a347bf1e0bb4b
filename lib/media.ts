import type { FileRef } from '@/types/listing';

export const VIDEO_EXTENSIONS = ['.mp4', '.avi', '.mov', '.mkv'] as const;
export const IMAGE_EXTENSIONS = ['.jpg', '.jpeg', '.png', '.gif'] as const;

export type MediaKind = 'video' | 'image' | 'other';

// Extension test runs on the URL path so query strings do not interfere
function urlPath(url: string): string {
  try {
    return decodeURIComponent(new URL(url).pathname).toLowerCase();
  } catch {
    return url.toLowerCase();
  }
}

function hasExtension(url: string, extensions: readonly string[]): boolean {
  const pathname = urlPath(url);
  return extensions.some(extension => pathname.endsWith(extension));
}

export function isVideo(file: FileRef): boolean {
  return hasExtension(file.url, VIDEO_EXTENSIONS);
}

export function isImage(file: FileRef): boolean {
  return hasExtension(file.url, IMAGE_EXTENSIONS);
}

export function mediaKind(file: FileRef): MediaKind {
  if (isVideo(file)) return 'video';
  if (isImage(file)) return 'image';
  return 'other';
}

/**
 * M3U playlist of the video files, in listing order, or null when there are none.
 */
export function buildPlaylist(files: readonly FileRef[]): string | null {
  const videos = files.filter(isVideo);
  if (videos.length === 0) {
    return null;
  }
  return `${videos.map(file => file.url).join('\n')}\n`;
}
