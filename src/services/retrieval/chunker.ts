/**
 * Line-aware chunking of node artifacts into evidence windows.
 *
 * A window holds at most maxChars characters and ends at the last line
 * break that leaves more than overlapChars of content; when there is none
 * (a long line, minified code) it is cut at maxChars. The next window
 * starts with the last overlapChars characters of the previous one, so
 * a token of up to overlapChars characters is never split by a boundary.
 */

import type { EvidenceChunk } from '../../models/evidence.js';
import type { SourceArtifact } from '../../models/graph.js';

export interface ChunkOptions {
  maxChars: number;
  overlapChars: number;
}

export function chunkArtifact(artifact: SourceArtifact, options: ChunkOptions): EvidenceChunk[] {
  if (artifact.text.trim().length === 0) {
    return [];
  }

  const { maxChars, overlapChars } = options;
  const lines = artifact.text.split(/\r?\n/);
  while (lines.length > 1 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  const text = lines.join('\n');
  const lineStarts = lineStartOffsets(text);

  const chunks: EvidenceChunk[] = [];
  let start = 0;
  for (;;) {
    const limit = Math.min(start + maxChars, text.length);
    let end = limit;
    let atLineBreak = false;
    if (limit < text.length) {
      const lineBreak = text.lastIndexOf('\n', limit);
      if (lineBreak > start + overlapChars) {
        end = lineBreak;
        atLineBreak = true;
      }
    }

    chunks.push({
      nodeId: artifact.nodeId,
      filePath: artifact.filePath,
      lineStart: lineAt(lineStarts, start),
      lineEnd: lineAt(lineStarts, end - 1),
      text: text.slice(start, end)
    });

    if (end >= text.length) break;
    // end - start > overlapChars, so every window advances
    start = overlapChars === 0 && atLineBreak ? end + 1 : end - overlapChars;
  }

  return chunks;
}

export function chunkArtifacts(artifacts: readonly SourceArtifact[], options: ChunkOptions): EvidenceChunk[] {
  return artifacts.flatMap(artifact => chunkArtifact(artifact, options));
}

function lineStartOffsets(text: string): number[] {
  const starts = [0];
  for (let i = 0; i < text.length; i++) {
    if (text[i] === '\n') starts.push(i + 1);
  }
  return starts;
}

/** 1-based line holding the character at offset */
function lineAt(lineStarts: readonly number[], offset: number): number {
  let low = 0;
  let high = lineStarts.length - 1;
  while (low < high) {
    const mid = (low + high + 1) >> 1;
    if (lineStarts[mid] <= offset) {
      low = mid;
    } else {
      high = mid - 1;
    }
  }
  return low + 1;
}
