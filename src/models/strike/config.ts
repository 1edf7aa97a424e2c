// Run configuration: defaults and validation
import type { AngularDomain, FoldMode, ResolvedStrikeConfig, StrikeConfig } from "./types";
import {
    DEFAULT_BIN_WIDTH_DEGREES,
    DEFAULT_ERROR_FLOOR_POLICY,
    DEFAULT_FOLD_MODE,
    DEFAULT_MEAN_METHOD,
    DEFAULT_TOLERANCE,
    FOLDED_DOMAIN,
    UNFOLDED_DOMAIN,
} from "./types";
import { InvalidInputError } from "./errors";

export function domainFor(foldMode: FoldMode): AngularDomain {
    return foldMode === "folded" ? FOLDED_DOMAIN : UNFOLDED_DOMAIN;
}

/** Fill defaults and reject values the engine cannot use. */
export function resolveStrikeConfig(config: StrikeConfig = {}): ResolvedStrikeConfig {
    const resolved: ResolvedStrikeConfig = {
        tolerance: config.tolerance ?? DEFAULT_TOLERANCE,
        binWidthDegrees: config.binWidthDegrees ?? DEFAULT_BIN_WIDTH_DEGREES,
        foldMode: config.foldMode ?? DEFAULT_FOLD_MODE,
        decadeRange: config.decadeRange ?? "auto",
        errorFloorDegrees: config.errorFloorDegrees ?? null,
        errorFloorPolicy: config.errorFloorPolicy ?? DEFAULT_ERROR_FLOOR_POLICY,
        meanMethod: config.meanMethod ?? DEFAULT_MEAN_METHOD,
        excludeZeroAngles: config.excludeZeroAngles ?? false,
        rotationDegrees: config.rotationDegrees ?? 0,
    };

    const { tolerance, binWidthDegrees, foldMode, decadeRange, errorFloorDegrees, rotationDegrees } = resolved;

    if (!(tolerance > 0 && tolerance < 1)) {
        throw new InvalidInputError(`tolerance must be in (0, 1), got ${tolerance}`);
    }
    if (foldMode !== "folded" && foldMode !== "unfolded") {
        throw new InvalidInputError(`unknown fold mode "${String(foldMode)}"`);
    }

    const domain = domainFor(foldMode);
    const span = domain.upper - domain.lower;
    if (!(binWidthDegrees > 0 && binWidthDegrees <= span)) {
        throw new InvalidInputError(`bin width must be in (0, ${span}] degrees, got ${binWidthDegrees}`);
    }

    if (decadeRange !== "auto") {
        const [bMin, bMax] = decadeRange;
        if (!Number.isInteger(bMin) || !Number.isInteger(bMax) || bMin >= bMax) {
            throw new InvalidInputError(`decade range must be two integers with min < max, got [${bMin}, ${bMax}]`);
        }
    }

    if (errorFloorDegrees !== null && !(errorFloorDegrees >= 0)) {
        throw new InvalidInputError(`error floor must be non-negative, got ${errorFloorDegrees}`);
    }
    if (resolved.errorFloorPolicy !== "exclude" && resolved.errorFloorPolicy !== "zero") {
        throw new InvalidInputError(`unknown error floor policy "${String(resolved.errorFloorPolicy)}"`);
    }
    if (resolved.meanMethod !== "arithmetic" && resolved.meanMethod !== "vector") {
        throw new InvalidInputError(`unknown mean method "${String(resolved.meanMethod)}"`);
    }
    if (!Number.isFinite(rotationDegrees)) {
        throw new InvalidInputError(`rotation must be finite, got ${rotationDegrees}`);
    }

    return resolved;
}
