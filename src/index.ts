export {
    createParserState,
    DEFAULT_FEEDRATE_MM_PER_MIN,
    estimateGCodeFile,
    estimateGCodeLines,
    estimateGCodeStream,
    parseAxisValue,
    processLine,
    toEstimationResult,
} from "./estimator.ts";
export type {EstimateOptions, EstimationResult, ParserState, Position} from "./estimator.ts";
export {EstimationError, isEstimationError} from "./errors.ts";
export type {EstimationErrorKind, EstimationOutcome} from "./errors.ts";
export {extrusionToGrams, isMaterialType, MATERIAL_PRESETS, materialSpecSchema, parseMaterialSpec} from "./material.ts";
export type {MaterialSpec, MaterialType} from "./material.ts";
export {
    calculateOptimalPricing,
    calculatePrintJobCost,
    electricityCost,
    getPriceAndTimeEstimate,
    maintenanceCost,
    materialCostPerGram,
} from "./estimates.ts";
export type {PriceAndTimeEstimate, PricingRecommendation, PrintJobCostBreakdown} from "./estimates.ts";
export {estimateQueueCompletion, remainingMinutes} from "./queue.ts";
export type {JobTimeEstimate, QueuedJob, QueueTimeEstimate, RunningJob} from "./queue.ts";
export {buildSlicerArgs, MODEL_EXTENSIONS, sliceModel} from "./slicer.ts";
export type {SliceOptions} from "./slicer.ts";
export {loadConfig} from "./config.ts";
export type {AppConfig, CostingConfig, SlicerConfig} from "./config.ts";
