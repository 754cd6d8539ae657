/**
 * packages/core/src/layout/engine/trace.ts — Structured layout tracing.
 *
 * Tracing is a collaborator handed to `createLayoutEngine({ tracer })`, so it
 * is enabled per engine instance. `createEnvTracer()` opts in through
 * BOXFLOW_LAYOUT_TRACE=1 and prints one line per record.
 */

import type { Dim, Vec2 } from "../types.js";
import type { LinearMode } from "./linear.js";

export type LayoutTraceRecord =
  | Readonly<{ phase: "gather"; nodeId: string; need: Vec2; pref: Vec2 }>
  | Readonly<{
      phase: "allocate";
      nodeId: string;
      dim: Dim;
      avail: number;
      extra: number;
      usePref: boolean;
      mode: LinearMode;
    }>
  | Readonly<{
      phase: "overflow";
      nodeId: string;
      childSize: Vec2;
      hasHScroll: boolean;
      hasVScroll: boolean;
    }>
  | Readonly<{ phase: "scroll"; nodeId: string; dim: Dim; value: number; deferred: boolean }>;

export type LayoutTracer = (record: LayoutTraceRecord) => void;

export type TraceCollector = Readonly<{
  tracer: LayoutTracer;
  /** Records in arrival order, oldest first. */
  records(): readonly LayoutTraceRecord[];
  /** Records dropped because the buffer was full. */
  dropped(): number;
  clear(): void;
}>;

export type TraceCollectorOptions = Readonly<{
  maxRecords?: number;
}>;

export const DEFAULT_TRACE_MAX_RECORDS = 1024;

function normalizeBound(value: number | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  if (!Number.isFinite(value) || value < 1) return fallback;
  return Math.floor(value);
}

/** Bounded in-memory trace buffer; the oldest records are discarded first. */
export function createTraceCollector(opts: TraceCollectorOptions = {}): TraceCollector {
  const maxRecords = normalizeBound(opts.maxRecords, DEFAULT_TRACE_MAX_RECORDS);
  const buffer: LayoutTraceRecord[] = [];
  let droppedCount = 0;

  return Object.freeze({
    tracer: (record: LayoutTraceRecord) => {
      if (buffer.length >= maxRecords) {
        buffer.shift();
        droppedCount++;
      }
      buffer.push(record);
    },
    records: () => Object.freeze(buffer.slice()),
    dropped: () => droppedCount,
    clear: () => {
      buffer.length = 0;
      droppedCount = 0;
    },
  });
}

function fmtVec(v: Vec2): string {
  return `(${String(v.x)}, ${String(v.y)})`;
}

export function formatTraceRecord(r: LayoutTraceRecord): string {
  switch (r.phase) {
    case "gather":
      return `gather   ${r.nodeId} need=${fmtVec(r.need)} pref=${fmtVec(r.pref)}`;
    case "allocate":
      return `allocate ${r.nodeId} ${r.dim} avail=${String(r.avail)} extra=${String(r.extra)} ${r.usePref ? "pref" : "need"} ${r.mode}`;
    case "overflow":
      return `overflow ${r.nodeId} child=${fmtVec(r.childSize)} h=${String(r.hasHScroll)} v=${String(r.hasVScroll)}`;
    case "scroll":
      return `scroll   ${r.nodeId} ${r.dim}=${String(r.value)}${r.deferred ? " (deferred)" : ""}`;
  }
}

/**
 * Console tracer when BOXFLOW_LAYOUT_TRACE=1, otherwise null.
 * Uses globalThis.process to avoid Node.js imports in core.
 */
export function createEnvTracer(): LayoutTracer | null {
  try {
    const g = globalThis as { process?: { env?: { BOXFLOW_LAYOUT_TRACE?: string } } };
    if (g.process?.env?.BOXFLOW_LAYOUT_TRACE !== "1") return null;
  } catch {
    return null;
  }
  const c = (globalThis as { console?: { log?: (msg: string) => void } }).console;
  return (record) => {
    c?.log?.(`[layout] ${formatTraceRecord(record)}`);
  };
}
