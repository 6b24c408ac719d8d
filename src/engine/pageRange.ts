import { InvalidPageRangeError } from "../errors";
import type { PageInterval } from "../types";

/**
 * Parse "1,3,5-7" (1-based, inclusive) into sorted, disjoint intervals.
 * Blank input means "all pages" and yields an empty list.
 * Reversed intervals are rejected; overlapping or touching ones are coalesced.
 */
export function parsePageRange(input: string, pageCount?: number): PageInterval[] {
  const out: PageInterval[] = [];
  for (const part of input.split(",")) {
    const p = part.trim();
    if (!p) continue;
    const m = p.match(/^([0-9]+)\s*-\s*([0-9]+)$/);
    if (m) {
      out.push({ start: Number(m[1]), end: Number(m[2]) });
    } else if (/^[0-9]+$/.test(p)) {
      const n = Number(p);
      out.push({ start: n, end: n });
    } else {
      throw new InvalidPageRangeError(`Invalid page range: "${p}"`);
    }
  }
  return normalizeIntervals(out, pageCount);
}

export function normalizeIntervals(intervals: readonly PageInterval[], pageCount?: number): PageInterval[] {
  for (const { start, end } of intervals) {
    if (!Number.isInteger(start) || !Number.isInteger(end) || start < 1) {
      throw new InvalidPageRangeError(`Pages start at 1 (got ${start}-${end})`);
    }
    if (start > end) throw new InvalidPageRangeError(`Reversed page range: ${start}-${end}`);
  }
  const sorted = [...intervals].sort((a, b) => a.start - b.start);
  const merged: PageInterval[] = [];
  for (const iv of sorted) {
    const last = merged[merged.length - 1];
    if (last && iv.start <= last.end + 1) last.end = Math.max(last.end, iv.end);
    else merged.push({ ...iv });
  }
  if (pageCount !== undefined) assertWithin(merged, pageCount);
  return merged;
}

function assertWithin(intervals: readonly PageInterval[], pageCount: number) {
  const last = intervals[intervals.length - 1];
  if (last && last.end > pageCount) {
    throw new InvalidPageRangeError(`Page ${last.end} exceeds page count (${pageCount})`);
  }
}

export function fitsWithin(intervals: readonly PageInterval[], pageCount: number): boolean {
  return intervals.every((iv) => iv.start >= 1 && iv.start <= iv.end && iv.end <= pageCount);
}

/** Zero-based page indices in ascending order; empty selection means every page. */
export function expandToIndices(intervals: readonly PageInterval[], pageCount: number): number[] {
  if (intervals.length === 0) return Array.from({ length: pageCount }, (_, i) => i);
  assertWithin(intervals, pageCount);
  const indices: number[] = [];
  for (const { start, end } of intervals) {
    for (let p = start; p <= end; p++) indices.push(p - 1);
  }
  return indices;
}

export function selectedPageCount(intervals: readonly PageInterval[], pageCount: number): number {
  if (intervals.length === 0) return pageCount;
  return intervals.reduce((sum, iv) => sum + (iv.end - iv.start + 1), 0);
}

export function formatPageRange(intervals: readonly PageInterval[]): string {
  return intervals.map(({ start, end }) => (start === end ? `${start}` : `${start}-${end}`)).join(",");
}
