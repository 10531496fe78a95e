import {ZodError} from "zod";
import {describe, expect, it} from "vitest";
import {extrusionToGrams, isMaterialType, MATERIAL_PRESETS, parseMaterialSpec} from "./material.ts";

describe("extrusionToGrams", () => {
    it("applies the cylinder volume formula", () => {
        // 1000 mm of 1.75 mm filament = π · 0.0875² · 100 cm³
        expect(extrusionToGrams(1000, MATERIAL_PRESETS.PLA)).toBeCloseTo(Math.PI * 0.0875 ** 2 * 100 * 1.24, 12);
    });

    it("is linear in density", () => {
        const single = extrusionToGrams(500, {diameterMm: 1.75, densityGPerCm3: 1.1}),
            double = extrusionToGrams(500, {diameterMm: 1.75, densityGPerCm3: 2.2});
        expect(double / single).toBeCloseTo(2, 12);
    });

    it("scales with the square of the diameter", () => {
        const thin = extrusionToGrams(500, {diameterMm: 1.5, densityGPerCm3: 1.24}),
            thick = extrusionToGrams(500, {diameterMm: 3, densityGPerCm3: 1.24});
        expect(thick / thin).toBeCloseTo(4, 12);
    });

    it("is zero without extrusion", () => {
        expect(extrusionToGrams(0, MATERIAL_PRESETS.ABS)).toBe(0);
    });
});

describe("parseMaterialSpec", () => {
    it("accepts positive dimensions", () => {
        expect(parseMaterialSpec({diameterMm: 2.85, densityGPerCm3: 1.27})).toEqual({diameterMm: 2.85, densityGPerCm3: 1.27});
    });

    it("rejects non-positive or missing values", () => {
        expect(() => parseMaterialSpec({diameterMm: 0, densityGPerCm3: 1.24})).toThrow(ZodError);
        expect(() => parseMaterialSpec({diameterMm: 1.75, densityGPerCm3: -1})).toThrow(ZodError);
        expect(() => parseMaterialSpec({diameterMm: Number("abc"), densityGPerCm3: 1.24})).toThrow(ZodError);
        expect(() => parseMaterialSpec({diameterMm: 1.75})).toThrow(ZodError);
    });
});

describe("isMaterialType", () => {
    it("knows the presets by their upper-case names", () => {
        expect(isMaterialType("PETG")).toBe(true);
        expect(isMaterialType("pla")).toBe(false);
        expect(isMaterialType("toString")).toBe(false);
    });
});
