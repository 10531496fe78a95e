// Usage:
//   npm run estimate -- <file> [--material PLA] [--diameter 1.75] [--density 1.24] [--margin 30]
//
// A model file (.stl, .3mf, ...) is sliced first; a .gcode file is analyzed as is.
// Prompts for the path when none is given. Prints the estimate as JSON.

import {join} from "node:path";
import {createInterface} from "node:readline/promises";
import {parseArgs} from "node:util";
import {loadConfig} from "./config.ts";
import {isEstimationError} from "./errors.ts";
import {calculateOptimalPricing, getPriceAndTimeEstimate} from "./estimates.ts";
import {isMaterialType, MATERIAL_PRESETS, parseMaterialSpec} from "./material.ts";
import {MODEL_EXTENSIONS, sliceModel} from "./slicer.ts";
import {extOf, jobFileName} from "./utils.ts";

async function prompt(question: string) {
    const rl = createInterface({input: process.stdin, output: process.stdout});
    try {
        return (await rl.question(question)).trim();
    } finally {
        rl.close();
    }
}

async function main() {
    const {values, positionals} = parseArgs({
        allowPositionals: true,
        options: {
            material: {type: "string", default: "PLA"},
            diameter: {type: "string"},
            density: {type: "string"},
            margin: {type: "string"},
        },
    });

    const inputPath = positionals[0] ?? await prompt("Input file path: ");
    if (!inputPath) {
        console.log("No input file path provided. Stopping.");
        return;
    }

    const config = loadConfig(),
        materialType = (values.material ?? "PLA").toUpperCase(),
        preset = isMaterialType(materialType) ? MATERIAL_PRESETS[materialType] : MATERIAL_PRESETS.PLA,
        material = parseMaterialSpec({
            diameterMm: values.diameter === undefined ? preset.diameterMm : Number(values.diameter),
            densityGPerCm3: values.density === undefined ? preset.densityGPerCm3 : Number(values.density),
        });

    let gCodePath = inputPath, sliceOutput: string | null = null;
    if (MODEL_EXTENSIONS.has(extOf(inputPath))) {
        gCodePath = join(config.slicer.outputDir, jobFileName("job", ".gcode"));
        sliceOutput = await sliceModel(inputPath, gCodePath, config.slicer, {material});
    }

    const estimates = await getPriceAndTimeEstimate(gCodePath, materialType, material, config.costing),
        pricing = values.margin === undefined ? null : calculateOptimalPricing(estimates.costBreakdown, Number(values.margin));

    console.log(JSON.stringify({
        gCodePath,
        sliced: sliceOutput !== null,
        ...estimates,
        pricing,
    }, null, 2));
}

main().catch((err: unknown) => {
    if (isEstimationError(err)) console.error(`${err.kind}: ${err.message}`);
    else console.error(`error: ${err instanceof Error ? err.message : String(err)}`);
    process.exitCode = 1;
});
