// Swing Coach - Result Validator / Normalizer
//
// Turns the untrusted output of the inference engine into an AnalysisResult.
// Pure and deterministic: the same raw payload and video metadata always give
// the same outcome. Every repair heuristic lives here; callers see either a
// normalized result plus the list of corrections applied, or a failure that
// carries the raw payload for diagnostics.

import {
  SWING_PHASES,
  type AnalysisResult,
  type NarrationLine,
  type SwingPhase,
  type SwingPhaseName,
  type VideoMetadata,
} from "./types.js";
import { clamp } from "./utils.js";

// ─── Types ──────────────────────────────────────────────────────────────────────

export type CorrectionKind =
  | "repaired_json"
  | "collapsed_instances"
  | "extra_instances_ignored"
  | "dropped_phase"
  | "clipped_frame"
  | "clamped_score"
  | "dropped_narration_line"
  | "derived_narration";

export interface Correction {
  kind: CorrectionKind;
  detail: string;
}

export interface ValidatorOptions {
  /** Clips shorter than this hold one swing; extra detected instances are collapsed. */
  shortClipThresholdSeconds: number;
}

export const DEFAULT_VALIDATOR_OPTIONS: ValidatorOptions = {
  shortClipThresholdSeconds: 10,
};

export type ValidationOutcome =
  | { ok: true; result: AnalysisResult; corrections: Correction[] }
  | { ok: false; reason: string; rawPayload: string; corrections: Correction[] };

export type RepairOutcome =
  | { ok: true; value: Record<string, unknown>; repairs: string[] }
  | { ok: false; reason: string };

interface RawPhase {
  label: string;
  start: unknown;
  end: unknown;
  feedback: unknown;
}

// ─── Small readers ──────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch {
    return { ok: false };
  }
}

function toNumber(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function toText(value: unknown): string {
  return typeof value === "string" ? value.trim() : "";
}

function toStringList(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.map(toText).filter((s) => s.length > 0);
}

function stringifyPayload(value: unknown): string {
  if (typeof value === "string") return value;
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

// ─── Structural repair ──────────────────────────────────────────────────────────

/** Remove markdown code fences, keeping the fenced body when there is one. */
function stripCodeFences(text: string): string {
  const fenced = /```[a-zA-Z]*\s*([\s\S]*?)(?:```|$)/.exec(text);
  return fenced ? fenced[1].trim() : text.replace(/```[a-zA-Z]*/g, "").trim();
}

/** Drop commas that directly precede a closing bracket, outside of strings. */
export function stripTrailingCommas(text: string): string {
  let out = "";
  let inString = false;
  let escaped = false;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      out += ch;
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') {
      inString = true;
      out += ch;
      continue;
    }
    if (ch === ",") {
      let j = i + 1;
      while (j < text.length && /\s/.test(text[j])) j++;
      if (text[j] === "}" || text[j] === "]") continue;
    }
    out += ch;
  }
  return out;
}

interface ScanState {
  inString: boolean;
  escaped: boolean;
  stack: string[];
}

function scan(text: string): ScanState {
  const state: ScanState = { inString: false, escaped: false, stack: [] };
  for (const ch of text) {
    if (state.inString) {
      if (state.escaped) state.escaped = false;
      else if (ch === "\\") state.escaped = true;
      else if (ch === '"') state.inString = false;
      continue;
    }
    if (ch === '"') state.inString = true;
    else if (ch === "{") state.stack.push("}");
    else if (ch === "[") state.stack.push("]");
    else if ((ch === "}" || ch === "]") && state.stack[state.stack.length - 1] === ch) state.stack.pop();
  }
  return state;
}

const DANGLING_KEY = /([{,])\s*"(?:[^"\\]|\\.)*"\s*:?\s*$/;
const DANGLING_COMMA = /,\s*$/;
const DANGLING_COLON = /:\s*$/;

/**
 * Close a JSON document cut off mid-stream: terminate an open string, drop a
 * dangling separator or key, then append the missing closers.
 */
export function closeTruncatedJson(text: string): string {
  let body = text.trimEnd();
  let state = scan(body);
  if (state.inString) {
    if (state.escaped) body = body.slice(0, -1);
    body += '"';
  }
  for (let round = 0; round < 4; round++) {
    state = scan(body);
    const top = state.stack[state.stack.length - 1];
    let next = body.replace(DANGLING_COMMA, "");
    if (top === "}") {
      next = next.replace(DANGLING_KEY, (_match, lead: string) => (lead === "{" ? "{" : ""));
    } else {
      next = next.replace(DANGLING_COLON, "");
    }
    next = next.trimEnd();
    if (next === body) break;
    body = next;
  }
  state = scan(body);
  return body + state.stack.reverse().join("");
}

/**
 * Parse a raw engine response into a JSON object, applying a fixed, bounded
 * list of repairs. Reports which repairs were needed.
 */
export function repairJson(raw: string): RepairOutcome {
  let text = raw.trim();
  if (text.length === 0) return { ok: false, reason: "Empty inference response" };

  const baseRepairs: string[] = [];
  const accept = (value: unknown, repairs: string[]): RepairOutcome =>
    isRecord(value)
      ? { ok: true, value, repairs }
      : { ok: false, reason: "Inference response is not a JSON object" };

  const direct = tryParse(text);
  if (direct.ok) return accept(direct.value, []);

  if (text.includes("```")) {
    text = stripCodeFences(text);
    baseRepairs.push("stripped code fences");
    const unfenced = tryParse(text);
    if (unfenced.ok) return accept(unfenced.value, baseRepairs);
  }

  const start = text.indexOf("{");
  if (start < 0) return { ok: false, reason: "No JSON object in inference response" };
  const end = text.lastIndexOf("}");

  const candidates: Array<{ text: string; repairs: string[] }> = [];
  if (end > start) {
    const body = text.slice(start, end + 1);
    const wrapped = body.length !== text.length ? ["removed text around the JSON object"] : [];
    candidates.push({ text: body, repairs: wrapped });
    candidates.push({ text: stripTrailingCommas(body), repairs: [...wrapped, "removed trailing commas"] });
  }
  const tail = text.slice(start);
  candidates.push({
    text: closeTruncatedJson(stripTrailingCommas(tail)),
    repairs: start > 0 ? ["removed text before the JSON object", "closed truncated JSON"] : ["closed truncated JSON"],
  });
  if (end > start) {
    candidates.push({
      text: closeTruncatedJson(stripTrailingCommas(text.slice(start, end + 1))),
      repairs: ["removed text around the JSON object", "closed truncated JSON"],
    });
  }

  for (const candidate of candidates) {
    const parsed = tryParse(candidate.text);
    if (parsed.ok) return accept(parsed.value, [...baseRepairs, ...candidate.repairs]);
  }
  return { ok: false, reason: "Inference response is not valid JSON after repair" };
}

// ─── Phase handling ─────────────────────────────────────────────────────────────

const PHASE_SET: ReadonlySet<string> = new Set(SWING_PHASES);

function isSwingPhaseName(name: string): name is SwingPhaseName {
  return PHASE_SET.has(name);
}

export function normalizePhaseName(label: string): string {
  return label.trim().toLowerCase().replace(/[\s-]+/g, "_");
}

/** Phases arrive either keyed by name or as an array of named entries. */
function readRawPhases(swing: Record<string, unknown>): RawPhase[] {
  const phases = swing.phases;
  const feedbackMap: Record<string, unknown> = isRecord(swing.feedback) ? swing.feedback : {};
  const read = (label: string, phase: Record<string, unknown>): RawPhase => ({
    label,
    start: phase.start_frame ?? phase.startFrame,
    end: phase.end_frame ?? phase.endFrame,
    feedback: phase.feedback ?? phase.comment ?? feedbackMap[label],
  });

  if (Array.isArray(phases)) {
    return phases.filter(isRecord).map((phase) => read(toText(phase.name ?? phase.phase), phase));
  }
  if (isRecord(phases)) {
    return Object.entries(phases).flatMap(([label, phase]) => (isRecord(phase) ? [read(label, phase)] : []));
  }
  return [];
}

function earliestStartFrame(swing: Record<string, unknown>): number {
  const starts = readRawPhases(swing)
    .map((phase) => toNumber(phase.start))
    .filter((n): n is number => n !== null);
  return starts.length > 0 ? Math.min(...starts) : Number.POSITIVE_INFINITY;
}

function clipFrame(
  frame: number,
  frameCount: number,
  field: string,
  corrections: Correction[],
): number {
  const rounded = Math.round(frame);
  const clipped = clamp(rounded, 0, frameCount);
  if (clipped !== rounded) {
    corrections.push({ kind: "clipped_frame", detail: `${field} ${rounded} clipped to ${clipped}` });
  }
  return clipped;
}

function normalizePhases(
  raw: RawPhase[],
  video: VideoMetadata,
  corrections: Correction[],
): Array<SwingPhase & { startFrame: number }> {
  const phases: Array<SwingPhase & { startFrame: number }> = [];
  const seen = new Set<string>();

  for (const phase of raw) {
    const name = normalizePhaseName(phase.label);
    if (!isSwingPhaseName(name)) {
      corrections.push({ kind: "dropped_phase", detail: `unknown phase "${phase.label}"` });
      continue;
    }
    if (seen.has(name)) {
      corrections.push({ kind: "dropped_phase", detail: `duplicate phase "${name}"` });
      continue;
    }
    const startRaw = toNumber(phase.start);
    const endRaw = toNumber(phase.end);
    if (startRaw === null || endRaw === null) {
      corrections.push({ kind: "dropped_phase", detail: `${name} has non-numeric frame bounds` });
      continue;
    }
    const startFrame = clipFrame(startRaw, video.frameCount, `${name}.start_frame`, corrections);
    const endFrame = clipFrame(endRaw, video.frameCount, `${name}.end_frame`, corrections);
    if (endFrame <= startFrame) {
      corrections.push({ kind: "dropped_phase", detail: `${name} is empty (${startFrame}-${endFrame})` });
      continue;
    }
    seen.add(name);
    const startTime = startFrame / video.frameRate;
    phases.push({
      name,
      startFrame,
      startTime,
      endTime: endFrame / video.frameRate,
      keyFrameTime: startTime,
      feedbackText: toText(phase.feedback),
    });
  }

  return phases.sort((a, b) => a.startFrame - b.startFrame);
}

// ─── Narration ──────────────────────────────────────────────────────────────────

function normalizeNarration(
  root: Record<string, unknown>,
  phases: SwingPhase[],
  video: VideoMetadata,
  corrections: Correction[],
): NarrationLine[] {
  const script = root.coaching_script ?? root.coachingScript;
  const rawLines = isRecord(script) && Array.isArray(script.lines) ? script.lines : Array.isArray(script) ? script : [];

  const lines: NarrationLine[] = [];
  rawLines.forEach((line, index) => {
    const text = isRecord(line) ? toText(line.text) : toText(line);
    if (text.length === 0) {
      corrections.push({ kind: "dropped_narration_line", detail: `line ${index} has no text` });
      return;
    }
    const frame = isRecord(line) ? toNumber(line.start_frame_number ?? line.start_frame ?? line.frame) : null;
    if (frame === null) {
      corrections.push({ kind: "dropped_narration_line", detail: `line ${index} has no frame cue` });
      return;
    }
    const cueFrame = clipFrame(frame, video.frameCount, `coaching_script.lines[${index}]`, corrections);
    lines.push({ text, cueTime: cueFrame / video.frameRate });
  });

  if (lines.length > 0) {
    return lines.map((line, order) => ({ line, order }))
      .sort((a, b) => a.line.cueTime - b.line.cueTime || a.order - b.order)
      .map(({ line }) => line);
  }

  const derived = phases
    .filter((phase) => phase.feedbackText.length > 0)
    .map((phase) => ({ text: phase.feedbackText, cueTime: phase.startTime }));
  if (derived.length > 0) {
    corrections.push({ kind: "derived_narration", detail: "narration built from phase feedback" });
  }
  return derived;
}

// ─── Summary and metrics ────────────────────────────────────────────────────────

function readMetrics(...sources: unknown[]): Record<string, number> {
  const metrics: Record<string, number> = {};
  for (const source of sources) {
    if (!isRecord(source)) continue;
    for (const [key, value] of Object.entries(source)) {
      const n = toNumber(value);
      if (n !== null && !(key in metrics)) metrics[key] = n;
    }
  }
  return metrics;
}

function readScore(swing: Record<string, unknown>, root: Record<string, unknown>, corrections: Correction[]): number | null {
  const score = toNumber(swing.score ?? root.score ?? root.overall_score);
  if (score === null) return null;
  const clamped = clamp(score, 0, 100);
  if (clamped !== score) {
    corrections.push({ kind: "clamped_score", detail: `score ${score} clamped to ${clamped}` });
  }
  return clamped;
}

// ─── Entry point ────────────────────────────────────────────────────────────────

/**
 * Validate and normalize a raw inference result against the clip it was
 * produced for. `raw` is the engine's text response or an already-parsed value.
 */
export function validateAnalysis(
  raw: unknown,
  video: VideoMetadata,
  options: ValidatorOptions = DEFAULT_VALIDATOR_OPTIONS,
): ValidationOutcome {
  const rawPayload = stringifyPayload(raw);
  const corrections: Correction[] = [];
  const fail = (reason: string): ValidationOutcome => ({ ok: false, reason, rawPayload, corrections });

  if (!(video.frameRate > 0) || !(video.frameCount > 0) || !Number.isFinite(video.frameRate)) {
    return fail(`Invalid video metadata (frameRate=${video.frameRate}, frameCount=${video.frameCount})`);
  }

  let root: Record<string, unknown>;
  if (typeof raw === "string") {
    const repaired = repairJson(raw);
    if (!repaired.ok) return fail(repaired.reason);
    for (const repair of repaired.repairs) corrections.push({ kind: "repaired_json", detail: repair });
    root = repaired.value;
  } else if (isRecord(raw)) {
    root = raw;
  } else {
    return fail("Inference response is not a JSON object");
  }

  const swings = Array.isArray(root.swings) ? root.swings.filter(isRecord) : [];
  if (swings.length === 0) {
    const engineError = toText(root.error);
    return fail(engineError ? `Engine reported: ${engineError}` : "No swing instance in inference response");
  }

  let swing = swings[0];
  if (swings.length > 1) {
    const ordered = swings
      .map((candidate, order) => ({ candidate, order, start: earliestStartFrame(candidate) }))
      .sort((a, b) => a.start - b.start || a.order - b.order);
    swing = ordered[0].candidate;
    if (video.durationSeconds < options.shortClipThresholdSeconds) {
      corrections.push({
        kind: "collapsed_instances",
        detail: `kept the first of ${swings.length} swing instances in a ${video.durationSeconds}s clip`,
      });
    } else {
      corrections.push({
        kind: "extra_instances_ignored",
        detail: `analyzed the first of ${swings.length} swing instances`,
      });
    }
  }

  const phases = normalizePhases(readRawPhases(swing), video, corrections);
  if (phases.length === 0) return fail("No usable swing phases after normalization");
  const swingPhases: SwingPhase[] = phases.map(({ startFrame: _startFrame, ...phase }) => phase);

  const summary = root.summary;
  const summaryRecord: Record<string, unknown> = isRecord(summary) ? summary : {};
  let highlights = toStringList(summaryRecord.highlights);
  if (highlights.length === 0) highlights = toStringList(swing.comments);
  const improvements = toStringList(summaryRecord.improvements);
  const summaryText =
    typeof summary === "string"
      ? summary.trim()
      : toText(summaryRecord.text ?? summaryRecord.overview) || [...highlights, ...improvements].join(" ");

  const result: AnalysisResult = {
    swingPhases,
    overallScore: readScore(swing, root, corrections),
    summaryText,
    highlights,
    improvements,
    metrics: readMetrics(swing.metrics, root.metrics),
    narrationScript: normalizeNarration(root, swingPhases, video, corrections),
    video: { ...video },
  };
  return { ok: true, result, corrections };
}
