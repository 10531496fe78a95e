import {extname} from "node:path";
import Currency from "currency.js";
import type {CostingConfig} from "./config.ts";

export type CurrencyFormat = Pick<CostingConfig, "currency" | "decimalMark" | "groupSeparator">;

/**
 * Lowercase extension with its dot, "" when there is none.
 */
export function extOf(name: string) {
    return extname(name).toLowerCase();
}

/**
 * Unique file name for a job artifact, e.g. `job-1767268800000-k3j9x0ab.gcode`.
 */
export function jobFileName(prefix: string, extension: string) {
    const suffix = Math.random().toString(36).slice(2, 10);
    return `${prefix}-${Date.now()}-${suffix}${extension}`;
}

export function round2(value: number) {
    return Math.round(value * 100) / 100;
}

export function formatPrice(amount: Currency, format: CurrencyFormat) {
    const number = amount.format({symbol: "", decimal: format.decimalMark, separator: format.groupSeparator});
    return `${number} ${format.currency}`;
}

/**
 * Price as returned to clients: the amount in cents and units plus a
 * display string in the configured currency.
 */
export function toPrice(amount: number, format: CurrencyFormat) {
    const value = Currency(amount);
    return {
        intValue: value.intValue,
        value: value.value,
        formatted: formatPrice(value, format),
        currency: format.currency,
    };
}

export type Price = ReturnType<typeof toPrice>;
