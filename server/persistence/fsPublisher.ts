import fs from 'node:fs/promises';
import path from 'node:path';
import { pathToFileURL } from 'node:url';
import type { ArtifactPublisher } from '../../shared/artifacts';
import type { AppConfig } from '../../shared/config';

export const sanitizeArtifactName = (value: string): string =>
  value
    .split('/')
    .map((segment) => segment.replace(/[^a-z0-9_.\-]/gi, '_').replace(/^\.+/, '_').slice(0, 120))
    .filter(Boolean)
    .join('/') || 'artifact';

const guardPath = (root: string, target: string) => {
  const relative = path.relative(root, target);
  if (relative.startsWith('..') || path.isAbsolute(relative)) {
    throw new Error(`Attempted to write outside of persistence root: ${target}`);
  }
};

/** Writes artifacts under `persistence.artifactsDir` and hands back `file://` URLs. */
export const createFsArtifactPublisher = (config: Pick<AppConfig, 'persistence'>): ArtifactPublisher => ({
  name: 'fs',
  publish: async (bytes, name) => {
    const target = path.resolve(config.persistence.artifactsDir, sanitizeArtifactName(name));
    guardPath(path.resolve(config.persistence.rootDir), target);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, bytes);
    return pathToFileURL(target).href;
  },
});
