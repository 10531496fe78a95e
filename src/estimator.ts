import {open, type FileHandle} from "node:fs/promises";
import type {Readable} from "node:stream";
import {pipeline} from "node:stream/promises";
import split from "split2";
import {EstimationError, type EstimationOutcome} from "./errors.ts";
import {extrusionToGrams, type MaterialSpec} from "./material.ts";

export const DEFAULT_FEEDRATE_MM_PER_MIN = 1500;

export interface Position {
    x: number;
    y: number;
    z: number;
}

/**
 * Mutable accumulator for one estimation. Every call gets its own.
 */
export interface ParserState {
    /** Last absolute E value seen, not the amount extruded. */
    currentExtruderPosition: number;
    totalExtrudedMm: number;
    currentFeedrateMmPerMin: number;
    lastPosition: Position;
    totalMoveTimeMin: number;
}

export interface EstimationResult {
    readonly materialGrams: number;
    readonly estimatedTimeMinutes: number;
    readonly totalExtrusionMm: number;
}

export interface EstimateOptions {
    signal?: AbortSignal;
}

type MoveAxis = "X" | "Y" | "Z" | "E" | "F";

const NUMBER = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

export function createParserState(): ParserState {
    return {
        currentExtruderPosition: 0,
        totalExtrudedMm: 0,
        currentFeedrateMmPerMin: DEFAULT_FEEDRATE_MM_PER_MIN,
        lastPosition: {x: 0, y: 0, z: 0},
        totalMoveTimeMin: 0,
    };
}

/**
 * Reads the numeric part of an axis word: an optionally signed decimal with
 * optional exponent, surrounded by optional whitespace (a tab left inside a
 * word counts as padding). Anything else yields null and the word is skipped.
 * "Infinity", "NaN" and exponents that overflow a double are rejected too,
 * although a lenient float parser would accept them.
 */
export function parseAxisValue(text: string): number | null {
    const trimmed = text.trim();
    if (!NUMBER.test(trimmed)) return null;
    const value = Number(trimmed);
    return Number.isFinite(value) ? value : null;
}

function isMoveAxis(letter: string): letter is MoveAxis {
    return letter === "X" || letter === "Y" || letter === "Z" || letter === "E" || letter === "F";
}

function parseMoveWords(words: string[]) {
    const axes: Partial<Record<MoveAxis, number>> = {};
    for (const word of words) {
        if (word.length < 2) continue;
        // axis letters are matched as written; only the command is uppercased
        const letter = word[0];
        if (!isMoveAxis(letter)) continue;
        const value = parseAxisValue(word.slice(1));
        if (value !== null) axes[letter] = value;
    }
    return axes;
}

function applyMove(state: ParserState, words: string[]) {
    const {X, Y, Z, E, F} = parseMoveWords(words);

    if (F !== undefined) state.currentFeedrateMmPerMin = F;

    if (E !== undefined) {
        const delta = E - state.currentExtruderPosition;
        // retractions move the reference but deposit nothing
        if (delta > 0) state.totalExtrudedMm += delta;
        state.currentExtruderPosition = E;
    }

    const last = state.lastPosition,
        target: Position = {x: X ?? last.x, y: Y ?? last.y, z: Z ?? last.z},
        distance = Math.hypot(target.x - last.x, target.y - last.y, target.z - last.z);

    if (distance > 0 && state.currentFeedrateMmPerMin > 0) {
        state.totalMoveTimeMin += distance / state.currentFeedrateMmPerMin;
    }

    state.lastPosition = target;
}

function applySetPosition(state: ParserState, words: string[]) {
    for (const word of words) {
        if (word.length < 2 || word[0] !== "E") continue;
        const value = parseAxisValue(word.slice(1));
        if (value !== null) state.currentExtruderPosition = value;
    }
}

/**
 * Applies one G-code line to the state. Only G0/G1 moves and the E word of
 * G92 are interpreted; every other command, malformed word or comment is
 * skipped without error.
 */
export function processLine(state: ParserState, line: string) {
    let text = line.trim();
    if (text === "" || text.startsWith(";")) return;

    const commentAt = text.indexOf(";");
    if (commentAt >= 0) text = text.slice(0, commentAt).trim();

    const words = text.split(" ").filter((word) => word !== "");
    if (words.length === 0) return;

    const command = words[0].toUpperCase(),
        rest = words.slice(1);

    if (command === "G0" || command === "G1") applyMove(state, rest);
    else if (command === "G92") applySetPosition(state, rest);
}

export function toEstimationResult(state: ParserState, material: MaterialSpec): EstimationResult {
    return Object.freeze({
        materialGrams: extrusionToGrams(state.totalExtrudedMm, material),
        estimatedTimeMinutes: state.totalMoveTimeMin,
        totalExtrusionMm: state.totalExtrudedMm,
    });
}

/**
 * Estimates from lines already in memory. Cannot fail.
 */
export function estimateGCodeLines(lines: Iterable<string>, material: MaterialSpec): EstimationResult {
    const state = createParserState();
    for (const line of lines) processLine(state, line);
    return toEstimationResult(state, material);
}

/**
 * Streams G-code text line by line (LF or CRLF). The signal is checked before
 * every line; an aborted or failed read yields an error, never a partial result.
 */
export async function estimateGCodeStream(
    source: Readable,
    material: MaterialSpec,
    options: EstimateOptions = {},
    path: string | null = null,
): Promise<EstimationOutcome<EstimationResult>> {
    const {signal} = options,
        state = createParserState();

    if (signal?.aborted) {
        source.destroy();
        return {ok: false, error: EstimationError.cancelled(path)};
    }

    try {
        await pipeline(source, split(), async function (lines: AsyncIterable<unknown>) {
            for await (const line of lines) {
                if (signal?.aborted) throw EstimationError.cancelled(path);
                processLine(state, String(line));
            }
        });
    } catch (err) {
        if (signal?.aborted) return {ok: false, error: EstimationError.cancelled(path)};
        return {ok: false, error: EstimationError.io(path, err)};
    }

    if (signal?.aborted) return {ok: false, error: EstimationError.cancelled(path)};
    return {ok: true, value: toEstimationResult(state, material)};
}

/**
 * Estimates a G-code file on disk. A path that cannot be opened or is not a
 * regular file is reported as NotFound.
 */
export async function estimateGCodeFile(
    gCodePath: string,
    material: MaterialSpec,
    options: EstimateOptions = {},
): Promise<EstimationOutcome<EstimationResult>> {
    let handle: FileHandle;
    try {
        handle = await open(gCodePath, "r");
    } catch (err) {
        return {ok: false, error: EstimationError.notFound(gCodePath, err)};
    }

    let isFile: boolean;
    try {
        isFile = (await handle.stat()).isFile();
    } catch (err) {
        await handle.close();
        return {ok: false, error: EstimationError.io(gCodePath, err)};
    }
    if (!isFile) {
        await handle.close();
        return {ok: false, error: EstimationError.notFound(gCodePath)};
    }

    return estimateGCodeStream(handle.createReadStream(), material, options, gCodePath);
}
