import {logger} from "./logger";

/**
 * Measures the time between marks of a single analysis session.
 */
export class Profiler {
    private _start: number;

    public constructor(private readonly _sessionName: string) {
        this._start = performance.now();
    }

    public mark(description: string): number {
        const elapsed = performance.now() - this._start;
        logger.verbose(`${this._sessionName} | ${description} : ${elapsed.toFixed(3)} ms`);

        this._start = performance.now();
        return elapsed;
    }
}
