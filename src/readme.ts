import * as fs from 'fs';
import { UpdaterError } from './errors.js';
import { Logger } from './logger.js';

export interface Markers {
  start: string;
  end: string;
}

export interface ReadmeUpdate {
  path: string;
  changed: boolean;
  content: string;
}

interface Region {
  from: number;
  to: number;
}

function locateRegion(content: string, markers: Markers): Region {
  const startIndex = content.indexOf(markers.start);
  if (startIndex === -1) {
    throw new UpdaterError('MarkerNotFound', `Start marker not found: ${markers.start}`);
  }

  const from = startIndex + markers.start.length;
  const to = content.indexOf(markers.end, from);
  if (to === -1) {
    throw new UpdaterError('MarkerNotFound', `End marker not found after start marker: ${markers.end}`);
  }

  return { from, to };
}

/**
 * Replaces whatever sits between the first start marker and the next end
 * marker with the block, framed by a newline on each side.
 */
export function replaceBetweenMarkers(content: string, block: string, markers: Markers): string {
  const { from, to } = locateRegion(content, markers);
  return `${content.slice(0, from)}\n${block}\n${content.slice(to)}`;
}

export function extractRegion(content: string, markers: Markers): string | null {
  try {
    const { from, to } = locateRegion(content, markers);
    return content.slice(from, to);
  } catch (error) {
    if (error instanceof UpdaterError && error.kind === 'MarkerNotFound') {
      return null;
    }
    throw error;
  }
}

export class ReadmeWriter {
  constructor(
    private filePath: string,
    private markers: Markers,
    private logger?: Logger
  ) {}

  get path(): string {
    return this.filePath;
  }

  read(): string {
    try {
      return fs.readFileSync(this.filePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        throw new UpdaterError('FileNotFound', `File not found: ${this.filePath}`, { cause: error });
      }
      throw error;
    }
  }

  update(block: string, options: { dryRun?: boolean } = {}): ReadmeUpdate {
    const current = this.read();
    const next = replaceBetweenMarkers(current, block, this.markers);
    const changed = next !== current;

    if (!changed) {
      this.logger?.info(`${this.filePath} already up to date`);
    } else if (options.dryRun) {
      this.logger?.info(`Dry run: ${this.filePath} would change`);
    } else {
      fs.writeFileSync(this.filePath, next, 'utf-8');
      this.logger?.info(`${this.filePath} updated`);
    }

    return { path: this.filePath, changed, content: next };
  }
}
