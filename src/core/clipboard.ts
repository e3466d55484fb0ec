/**
 * Clipboard
 *
 * The single clipboard copy, cut and paste go through. Hosts inject an
 * implementation backed by the OS clipboard; the core ships an in-memory one.
 */

/**
 * How clipped text was produced. Block clips hold one row per line.
 */
export type ClipKind = 'text' | 'block';

export interface Clip {
  text: string;
  kind: ClipKind;
}

export interface Clipboard {
  read(): Clip | null;
  write(clip: Clip): void;
}

export class MemoryClipboard implements Clipboard {
  private clip: Clip | null = null;

  read(): Clip | null {
    return this.clip ? { ...this.clip } : null;
  }

  write(clip: Clip): void {
    this.clip = { ...clip };
  }

  clear(): void {
    this.clip = null;
  }
}

/**
 * Rows of a clip: a block clip splits into its rows, text stays whole.
 */
export function clipRows(clip: Clip): string[] {
  return clip.kind === 'block' ? clip.text.split('\n') : [clip.text];
}
