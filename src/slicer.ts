import {spawn} from "node:child_process";
import {mkdir, stat} from "node:fs/promises";
import {dirname} from "node:path";
import type {SlicerConfig} from "./config.ts";
import type {MaterialSpec} from "./material.ts";

export const MODEL_EXTENSIONS = new Set([".stl", ".3mf", ".amf", ".obj", ".step", ".stp", ".ste"]);

export interface SliceOptions {
    material: MaterialSpec;
    signal?: AbortSignal;
}

/**
 * Fixed FFF profile handed to the slicer; only the filament diameter follows
 * the material.
 */
export function buildSlicerArgs(inputPath: string, outputPath: string, material: MaterialSpec) {
    return [
        "--output", outputPath,
        "--layer-height", "0.2",
        "--fill-density", "20%",
        "--filament-diameter", String(material.diameterMm),
        "--nozzle-diameter", "0.4",
        "--temperature", "200",
        "--bed-temperature", "60",
        "--fill-pattern", "rectilinear",
        "--perimeters", "3",
        "--top-solid-layers", "3",
        "--bottom-solid-layers", "3",
        "--retract-length", "2",
        "--retract-speed", "40",
        "--print-center", "100,100",
        inputPath,
    ];
}

/**
 * Runs the slicer headless to produce G-code at outputPath, creating the
 * output directory first. Rejects on non-zero exit (with captured stderr), on
 * timeout (the process is killed), on abort, and when the slicer exits cleanly
 * without writing the file. Resolves with the slicer's stdout.
 */
export async function sliceModel(inputPath: string, outputPath: string, config: SlicerConfig, options: SliceOptions) {
    const args = buildSlicerArgs(inputPath, outputPath, options.material),
        outputDir = dirname(outputPath);

    await mkdir(outputDir, {recursive: true});

    const proc = spawn(config.path, args, {
        cwd: outputDir,
        stdio: ["ignore", "pipe", "pipe"],
        signal: options.signal,
    });

    let stdout = "", stderr = "", timedOut = false;
    proc.stdout.setEncoding("utf8").on("data", (chunk: string) => { stdout += chunk; });
    proc.stderr.setEncoding("utf8").on("data", (chunk: string) => { stderr += chunk; });

    const timer = setTimeout(() => {
        timedOut = true;
        proc.kill("SIGKILL");
    }, config.timeoutMs);

    let code: number | null, signal: NodeJS.Signals | null;
    try {
        [code, signal] = await new Promise<[number | null, NodeJS.Signals | null]>((resolve, reject) => {
            proc.once("error", reject);
            proc.once("close", (exitCode, exitSignal) => resolve([exitCode, exitSignal]));
        });
    } finally {
        clearTimeout(timer);
    }

    if (timedOut) {
        console.error(`slicer timeout. stdout:\n${stdout}\nstderr:\n${stderr}`);
        throw new Error(`slicer timed out after ${config.timeoutMs / 1000}s`);
    }
    if (signal) throw new Error(`slicer was stopped by ${signal}: ${stderr}`);
    if (code !== 0) throw new Error(`slicer failed (code ${code}): ${stderr}`);

    try {
        await stat(outputPath);
    } catch {
        throw new Error(`slicer completed but G-code was not created at ${outputPath}. Output: ${stdout}`);
    }

    console.log(`slicer finished: ${outputPath}`);
    return stdout;
}
