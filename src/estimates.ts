import Currency from "currency.js";
import type {CostingConfig} from "./config.ts";
import {estimateGCodeFile, type EstimateOptions, type EstimationResult} from "./estimator.ts";
import type {MaterialSpec} from "./material.ts";
import {round2, toPrice, type Price} from "./utils.ts";

export interface PrintJobCostBreakdown {
    materialCost: number;
    electricityCost: number;
    maintenanceCost: number;
    totalCost: number;
    materialUsedGrams: number;
    printTimeMinutes: number;
    materialType: string;
}

export interface PricingRecommendation {
    totalCost: number;
    suggestedPrice: number;
    profitMargin: number;
    profitAmount: number;
    costBreakdown: PrintJobCostBreakdown;
}

export interface PriceAndTimeEstimate {
    estimation: EstimationResult;
    costBreakdown: PrintJobCostBreakdown;
    priceEstimate: Price;
    timeEstimate: number;
}

const money = (value: number) => Currency(value).value;

/**
 * Filament price per gram, looked up by material type (case-insensitive).
 */
export function materialCostPerGram(materialType: string, costing: CostingConfig) {
    let costPerKg: number;
    switch (materialType.toUpperCase()) {
        case "PLA": costPerKg = costing.plaCostPerKg; break;
        case "ABS": costPerKg = costing.absCostPerKg; break;
        case "PETG": costPerKg = costing.petgCostPerKg; break;
        default: costPerKg = costing.defaultCostPerKg;
    }
    return costPerKg / 1000;
}

// W × h / 1000 = kWh
export function electricityCost(printTimeMinutes: number, printerWattage: number, electricityRate: number) {
    const energyKwh = (printerWattage * (printTimeMinutes / 60)) / 1000;
    return energyKwh * electricityRate;
}

export function maintenanceCost(printTimeMinutes: number, maintenanceCostPerHour: number) {
    return maintenanceCostPerHour * (printTimeMinutes / 60);
}

/**
 * Linear cost model: material by weight, electricity and maintenance by time.
 * The total is summed before rounding.
 */
export function calculatePrintJobCost(
    materialInGrams: number,
    printTimeMinutes: number,
    materialType: string,
    costing: CostingConfig,
): PrintJobCostBreakdown {
    const material = materialCostPerGram(materialType, costing) * materialInGrams,
        electricity = electricityCost(printTimeMinutes, costing.printerWattage, costing.electricityRate),
        maintenance = maintenanceCost(printTimeMinutes, costing.maintenanceCostPerHour);

    return {
        materialCost: money(material),
        electricityCost: money(electricity),
        maintenanceCost: money(maintenance),
        totalCost: money(material + electricity + maintenance),
        materialUsedGrams: round2(materialInGrams),
        printTimeMinutes: round2(printTimeMinutes),
        materialType,
    };
}

/**
 * price = cost / (1 - margin). The margin is a percentage in [0, 100).
 */
export function calculateOptimalPricing(costBreakdown: PrintJobCostBreakdown, targetProfitMarginPercent: number): PricingRecommendation {
    if (!(targetProfitMarginPercent >= 0 && targetProfitMarginPercent < 100)) {
        throw new RangeError(`profit margin must be at least 0 and below 100 percent, got ${targetProfitMarginPercent}`);
    }

    const suggestedPrice = costBreakdown.totalCost / (1 - targetProfitMarginPercent / 100),
        profitAmount = suggestedPrice - costBreakdown.totalCost;

    return {
        totalCost: money(costBreakdown.totalCost),
        suggestedPrice: money(suggestedPrice),
        profitMargin: targetProfitMarginPercent,
        profitAmount: money(profitAmount),
        costBreakdown,
    };
}

/**
 * Analyzes a sliced G-code file and prices it. Estimation failures are thrown
 * as the EstimationError the analyzer returned.
 */
export async function getPriceAndTimeEstimate(
    gCodePath: string,
    materialType: string,
    material: MaterialSpec,
    costing: CostingConfig,
    options: EstimateOptions = {},
): Promise<PriceAndTimeEstimate> {
    const outcome = await estimateGCodeFile(gCodePath, material, options);
    if (!outcome.ok) {
        console.error(`G-code analysis failed (${outcome.error.kind}): ${outcome.error.message}`);
        throw outcome.error;
    }

    const estimation = outcome.value;
    console.log(`G-code analysis: extrusion=${estimation.totalExtrusionMm.toFixed(2)}mm, ` +
        `material=${estimation.materialGrams.toFixed(2)}g, time=${estimation.estimatedTimeMinutes.toFixed(1)}min`);

    const costBreakdown = calculatePrintJobCost(estimation.materialGrams, estimation.estimatedTimeMinutes, materialType, costing);

    return {
        estimation,
        costBreakdown,
        priceEstimate: toPrice(costBreakdown.totalCost, costing),
        timeEstimate: estimation.estimatedTimeMinutes,
    };
}
