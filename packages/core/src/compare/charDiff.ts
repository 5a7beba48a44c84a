import type { DiffSegment, DiffSegmentKind } from "../types";
import { SequenceMatcher } from "./sequenceMatcher";

function pushSegment(segments: DiffSegment[], kind: DiffSegmentKind, value: string): void {
  if (!value) {
    return;
  }

  const previous = segments[segments.length - 1];
  if (previous && previous.kind === kind) {
    previous.value += value;
    return;
  }

  segments.push({ kind, value });
}

/**
 * Character-level diff of two article bodies. A replaced span is reported as
 * its removed text followed by its added text.
 */
export function buildCharDiff(oldText: string, newText: string): DiffSegment[] {
  const matcher = new SequenceMatcher(oldText, newText);
  const segments: DiffSegment[] = [];

  for (const opcode of matcher.getOpcodes()) {
    const removed = matcher.sliceA(opcode.aStart, opcode.aEnd);
    const added = matcher.sliceB(opcode.bStart, opcode.bEnd);

    switch (opcode.tag) {
      case "equal":
        pushSegment(segments, "equal", removed);
        break;
      case "delete":
        pushSegment(segments, "removed", removed);
        break;
      case "insert":
        pushSegment(segments, "added", added);
        break;
      case "replace":
        pushSegment(segments, "removed", removed);
        pushSegment(segments, "added", added);
        break;
    }
  }

  return segments;
}
