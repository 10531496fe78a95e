import {z} from "zod";

export const materialSpecSchema = z.object({
    diameterMm: z.number().positive(),
    densityGPerCm3: z.number().positive(),
});

/**
 * Physical filament properties used for the length-to-mass conversion.
 */
export type MaterialSpec = Readonly<z.infer<typeof materialSpecSchema>>;

export type MaterialType = "PLA" | "ABS" | "PETG";

export const MATERIAL_PRESETS: Readonly<Record<MaterialType, MaterialSpec>> = {
    PLA: {diameterMm: 1.75, densityGPerCm3: 1.24},
    ABS: {diameterMm: 1.75, densityGPerCm3: 1.04},
    PETG: {diameterMm: 1.75, densityGPerCm3: 1.27},
};

export function isMaterialType(value: string): value is MaterialType {
    return Object.hasOwn(MATERIAL_PRESETS, value);
}

/**
 * Validates untrusted input (CLI flags, request bodies). Throws a ZodError.
 */
export function parseMaterialSpec(input: unknown): MaterialSpec {
    return materialSpecSchema.parse(input);
}

/**
 * Treats the extruded filament as a cylinder; lengths go to cm so the volume
 * comes out in cm³ and pairs with a g/cm³ density.
 */
export function extrusionToGrams(totalExtrusionMm: number, material: MaterialSpec) {
    const filamentRadiusCm = (material.diameterMm / 2) / 10,
        volumeCm3 = Math.PI * filamentRadiusCm ** 2 * (totalExtrusionMm / 10);
    return volumeCm3 * material.densityGPerCm3;
}
