/**
 * Evaluation stages and the transitions between them.
 */

export type SignalStage =
    | "PENDING"             // Request received
    | "TREND_CHECKED"       // Trend gate passed
    | "RISK_COMPUTED"       // Stop / target computed
    | "SOLVENCY_CHECKED"    // Position sized
    | "DECIDED";            // Terminal

export const STAGE_TRANSITIONS: Readonly<Record<SignalStage, readonly SignalStage[]>> = {
    "PENDING": ["TREND_CHECKED", "DECIDED"],
    "TREND_CHECKED": ["RISK_COMPUTED", "DECIDED"],
    "RISK_COMPUTED": ["SOLVENCY_CHECKED", "DECIDED"],
    "SOLVENCY_CHECKED": ["DECIDED"],
    "DECIDED": []
};

export function isValidStageTransition(from: SignalStage, to: SignalStage): boolean {
    return STAGE_TRANSITIONS[from].includes(to);
}

/**
 * Append-only record of the stages one evaluation went through.
 */
export class StageTrail {
    readonly #stages: SignalStage[] = ["PENDING"];

    get current(): SignalStage {
        return this.#stages[this.#stages.length - 1] ?? "PENDING";
    }

    advance(to: SignalStage): void {
        if (!isValidStageTransition(this.current, to)) {
            throw new Error(`Invalid stage transition: ${this.current} -> ${to}`);
        }
        this.#stages.push(to);
    }

    toArray(): readonly SignalStage[] {
        return Object.freeze([...this.#stages]);
    }
}
