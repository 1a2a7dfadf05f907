import type { ResourceId } from "../types.js";

/** A contiguous span of one original resource, in output order. */
export type SourceSegment = {
  readonly resource: ResourceId;
  readonly originalStart: number;
  readonly length: number;
};

/** One entry of an assembled map: generated span → original span. */
export type SourceMapSegment = {
  readonly generatedStart: number;
  readonly resource: ResourceId;
  readonly originalStart: number;
  readonly length: number;
};

export type OriginalLocation = {
  resource: ResourceId;
  originalOffset: number;
};

export type OriginalRange = {
  resource: ResourceId;
  start: number;
  end: number;
};

export function segmentsLength(segments: readonly SourceSegment[]): number {
  let total = 0;
  for (const segment of segments) total += segment.length;
  return total;
}

export class SourceMapBuilder {
  private readonly segments: SourceMapSegment[] = [];

  /** Zero-length segments are ignored */
  addSegment(resource: ResourceId, generatedStart: number, originalStart: number, length: number): void {
    if (length <= 0) return;
    this.segments.push({ generatedStart, resource, originalStart, length });
  }

  build(): SourceMap {
    return new SourceMap(this.segments.slice().sort((a, b) => a.generatedStart - b.generatedStart));
  }
}

/**
 * Ordered, non-overlapping mapping from merged-output offsets to
 * (original resource, original offset).
 */
export class SourceMap {
  static readonly empty = new SourceMap([]);

  constructor(readonly segments: readonly SourceMapSegment[]) {}

  /** Total generated length covered */
  get length(): number {
    const last = this.segments[this.segments.length - 1];
    return last ? last.generatedStart + last.length : 0;
  }

  query(generatedOffset: number): OriginalLocation | undefined {
    const segment = this.segmentAt(generatedOffset);
    if (!segment) return undefined;
    return {
      resource: segment.resource,
      originalOffset: segment.originalStart + (generatedOffset - segment.generatedStart),
    };
  }

  /** Original spans covering `[start, end)` of the generated output */
  queryRange(start: number, end: number): OriginalRange[] {
    const out: OriginalRange[] = [];
    if (end <= start) return out;
    for (const segment of this.segments) {
      const segEnd = segment.generatedStart + segment.length;
      if (segEnd <= start) continue;
      if (segment.generatedStart >= end) break;
      const from = Math.max(start, segment.generatedStart);
      const to = Math.min(end, segEnd);
      out.push({
        resource: segment.resource,
        start: segment.originalStart + (from - segment.generatedStart),
        end: segment.originalStart + (to - segment.generatedStart),
      });
    }
    return out;
  }

  private segmentAt(offset: number): SourceMapSegment | undefined {
    let lo = 0;
    let hi = this.segments.length - 1;
    while (lo <= hi) {
      const mid = (lo + hi) >>> 1;
      const segment = this.segments[mid];
      if (offset < segment.generatedStart) hi = mid - 1;
      else if (offset >= segment.generatedStart + segment.length) lo = mid + 1;
      else return segment;
    }
    return undefined;
  }
}
