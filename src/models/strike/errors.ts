import type { Estimator } from "./types";

export class StrikeError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "StrikeError";
    }
}

/** Fatal: the run cannot proceed with this input or configuration */
export class InvalidInputError extends StrikeError {
    constructor(
        message: string,
        public stationId?: string,
    ) {
        super(stationId ? `${stationId}: ${message}` : message);
        this.name = "InvalidInputError";
    }
}

/** Non-fatal: collected per bin on the report, never thrown by the report builder */
export class EmptyBinError extends StrikeError {
    constructor(
        public binLabel: string,
        public estimator: Estimator,
    ) {
        super(`No ${estimator} samples in ${binLabel}`);
        this.name = "EmptyBinError";
    }
}
