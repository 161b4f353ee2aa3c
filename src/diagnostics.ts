/**
 * Diagnostics for matcher internals
 *
 * The matcher never logs on its own: it emits structured events to a sink
 * handed to it at construction. The default sink drops everything.
 */

import { Chalk, type ChalkInstance } from "chalk";

interface EventScope {
  /**
   * Compound pattern tokens, outermost first, whose nested matcher emitted
   * the event. Absent for events of the top-level matcher, whose positions
   * are reference positions; nested positions index the token's elements.
   */
  readonly within?: readonly unknown[];
}

/**
 * Structured trace events emitted while scanning
 */
export type DiagnosticEvent = EventScope &
  (
    | {
        readonly type: "match";
        /** Reference position the match ends at */
        readonly position: number;
        readonly score: number;
      }
    | {
        readonly type: "lookup";
        readonly token: unknown;
        /** How the index resolved the token */
        readonly kind: "exact" | "fuzzy" | "none";
        readonly score: number;
      }
    | {
        readonly type: "step";
        readonly state: readonly number[];
        readonly score: number;
      }
  );

export interface DiagnosticsSink {
  emit(event: DiagnosticEvent): void;
}

/**
 * Sink that discards every event
 */
export const silentSink: DiagnosticsSink = Object.freeze({
  emit(): void {},
});

/**
 * Wrap `sink` so every event is tagged as coming from the nested matcher
 * of the compound token `token`
 */
export function scopedSink(sink: DiagnosticsSink, token: unknown): DiagnosticsSink {
  if (sink === silentSink) return sink;

  return {
    emit(event: DiagnosticEvent): void {
      sink.emit({ ...event, within: [token, ...(event.within ?? [])] });
    },
  };
}

/**
 * `"match"` reports matches only; `"trace"` adds index lookups and tracker steps
 */
export type DiagnosticLevel = "match" | "trace";

export interface ConsoleSinkOptions {
  /** @default "match" */
  level?: DiagnosticLevel;
  /** Prepended as `[prefix]` to every line */
  prefix?: string;
  /** @default writes to stderr */
  write?: (line: string) => void;
  /** Disable ANSI colours, e.g. when piping */
  colors?: boolean;
}

function formatScore(score: number): string {
  return score.toFixed(6);
}

function formatToken(token: unknown): string {
  return typeof token === "string" ? JSON.stringify(token) : String(token);
}

/**
 * Render an event as a single plain-text line
 *
 * @example
 * ```typescript
 * formatDiagnosticEvent({ type: "match", position: 4, score: 0.5 });
 * // "matched at 4 (0.500000)"
 * ```
 */
export function formatDiagnosticEvent(event: DiagnosticEvent): string {
  const scope =
    event.within !== undefined && event.within.length > 0
      ? `${event.within.map(formatToken).join(" > ")}: `
      : "";

  return `${scope}${formatEventBody(event)}`;
}

function formatEventBody(event: DiagnosticEvent): string {
  switch (event.type) {
    case "match":
      return `matched at ${event.position} (${formatScore(event.score)})`;
    case "lookup":
      return `lookup ${formatToken(event.token)} -> ${event.kind} (${formatScore(event.score)})`;
    case "step":
      return `step [${event.state.map(formatScore).join(", ")}] -> ${formatScore(event.score)}`;
  }
}

/**
 * Create a sink that prints events, one line each
 */
export function createConsoleSink(options: ConsoleSinkOptions = {}): DiagnosticsSink {
  const level = options.level ?? "match";
  const write = options.write ?? ((line: string) => process.stderr.write(`${line}\n`));
  const colour: ChalkInstance = options.colors === false ? new Chalk({ level: 0 }) : new Chalk();
  const prefix = options.prefix !== undefined && options.prefix !== "" ? `[${options.prefix}] ` : "";

  return {
    emit(event: DiagnosticEvent): void {
      if (level === "match" && event.type !== "match") return;

      const line = `${prefix}${formatDiagnosticEvent(event)}`;
      write(event.type === "match" ? colour.green(line) : colour.gray(line));
    },
  };
}
