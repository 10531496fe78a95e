// Env vars:
//   SLICER_PATH=prusa-slicer          # slicer executable (PATH lookup when bare)
//   SLICER_TIMEOUT_MS=600000          # slicer is killed after this long
//   GCODE_DIR=/tmp                    # where sliced G-code is written (default os tmpdir)
//   CURRENCY=EUR                      # label appended to formatted prices
//   CURRENCY_DECIMAL=,                # decimal mark in formatted prices
//   CURRENCY_SEPARATOR=.              # thousands separator in formatted prices
//   PLA_COST_PER_KG=20                # filament prices per kg, by material type
//   ABS_COST_PER_KG=25
//   PETG_COST_PER_KG=30
//   DEFAULT_COST_PER_KG=20            # any other material type
//   ELECTRICITY_RATE=0.12             # per kWh
//   PRINTER_WATTAGE=200               # W
//   MAINTENANCE_COST_PER_HOUR=0.5

import {tmpdir} from "node:os";

export interface CostingConfig {
    plaCostPerKg: number;
    absCostPerKg: number;
    petgCostPerKg: number;
    defaultCostPerKg: number;
    electricityRate: number;
    printerWattage: number;
    maintenanceCostPerHour: number;
    currency: string;
    decimalMark: string;
    groupSeparator: string;
}

export interface SlicerConfig {
    path: string;
    timeoutMs: number;
    outputDir: string;
}

export interface AppConfig {
    slicer: SlicerConfig;
    costing: CostingConfig;
}

type Env = Record<string, string | undefined>;

export function loadConfig(env: Env = process.env): AppConfig {
    return {
        slicer: {
            path: env.SLICER_PATH || "prusa-slicer",
            timeoutMs: Number(env.SLICER_TIMEOUT_MS || 10 * 60 * 1000),
            outputDir: env.GCODE_DIR || tmpdir(),
        },
        costing: {
            plaCostPerKg: Number(env.PLA_COST_PER_KG || 20),
            absCostPerKg: Number(env.ABS_COST_PER_KG || 25),
            petgCostPerKg: Number(env.PETG_COST_PER_KG || 30),
            defaultCostPerKg: Number(env.DEFAULT_COST_PER_KG || 20),
            electricityRate: Number(env.ELECTRICITY_RATE || 0.12),
            printerWattage: Number(env.PRINTER_WATTAGE || 200),
            maintenanceCostPerHour: Number(env.MAINTENANCE_COST_PER_HOUR || 0.5),
            currency: env.CURRENCY || "EUR",
            decimalMark: env.CURRENCY_DECIMAL || ",",
            groupSeparator: env.CURRENCY_SEPARATOR || ".",
        },
    };
}
