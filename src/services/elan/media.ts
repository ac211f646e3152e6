import { basename, isAbsolute } from 'node:path';
import { fileURLToPath, pathToFileURL } from 'node:url';
import type { Eaf, MediaDescriptor } from '../../types/elan';
import { EafError } from '../../errors';
import { mimeTypeFor } from '../../utils/media-formats';
import { log } from '../../utils/log';

function fileUrl(path: string): string {
  if (path.trim() === '' || !isAbsolute(path)) {
    throw new EafError('MediaPathInvalid', `Media path must be absolute: '${path}'`, { path });
  }
  return pathToFileURL(path).href;
}

/** Local path of a `file:` media URL */
function urlPath(mediaUrl: string): string | undefined {
  if (!mediaUrl.startsWith('file:')) return undefined;
  try {
    return fileURLToPath(mediaUrl);
  } catch (err) {
    log.debug(`Unreadable media URL '${mediaUrl}':`, err);
    return undefined;
  }
}

function fileName(md: MediaDescriptor): string | undefined {
  const path = urlPath(md.mediaUrl) ?? md.relativeMediaUrl;
  return path ? basename(path) : undefined;
}

export function mediaDescriptor(path: string, extractedFrom?: string): MediaDescriptor {
  return {
    mediaUrl: fileUrl(path),
    relativeMediaUrl: `./${basename(path)}`,
    mimeType: mimeTypeFor(path),
    ...(extractedFrom !== undefined ? { extractedFrom: fileUrl(extractedFrom) } : {}),
  };
}

/** Link a media file. Paths must be absolute. */
export function addMedia(doc: Eaf, path: string, extractedFrom?: string): Eaf {
  const md = mediaDescriptor(path, extractedFrom);
  return { ...doc, header: { ...doc.header, mediaDescriptors: [...doc.header.mediaDescriptors, md] } };
}

/** Unlink every descriptor whose file name matches that of `path` */
export function removeMedia(doc: Eaf, path: string): Eaf {
  const name = basename(path);
  return {
    ...doc,
    header: { ...doc.header, mediaDescriptors: doc.header.mediaDescriptors.filter((md) => fileName(md) !== name) },
  };
}

/**
 * Drop media paths, which may reveal user names or directory layout. With
 * `keepFilename` each descriptor keeps a relative `./name` and an empty media URL.
 */
export function scrubMedia(doc: Eaf, keepFilename: boolean): Eaf {
  const mediaDescriptors = keepFilename
    ? doc.header.mediaDescriptors.flatMap((md): MediaDescriptor[] => {
        const name = fileName(md);
        if (!name) return [];
        const scrubbed: MediaDescriptor = { mediaUrl: '', relativeMediaUrl: `./${name}`, mimeType: mimeTypeFor(name) };
        return [md.timeOrigin === undefined ? scrubbed : { ...scrubbed, timeOrigin: md.timeOrigin }];
      })
    : [];
  return { ...doc, header: { ...doc.header, mediaFile: '', mediaDescriptors } };
}

export interface MediaPath {
  path: string;
  relativePath?: string;
}

/** Local paths of linked media; descriptors without a `file:` URL are skipped */
export function mediaPaths(doc: Eaf): MediaPath[] {
  return doc.header.mediaDescriptors.flatMap((md) => {
    const path = urlPath(md.mediaUrl);
    return path === undefined ? [] : [{ path, relativePath: md.relativeMediaUrl }];
  });
}
