import type { StrState, Trace } from '../outcome/types.js';

import { traceOfStates } from '../outcome/trace.js';

export const SIMULATION_TRACE_TYPE = 'Simulation';

// Owned by the caller so that states committed before a failure stay reachable.
export class SimulationRecorder {
  private readonly recorded: StrState[] = [];
  private unsatisfiable = false;

  record(state: StrState): void {
    this.recorded.push({ ...state });
  }

  markUnsatisfiable(): void {
    this.unsatisfiable = true;
  }

  get states(): readonly StrState[] {
    return this.recorded;
  }

  get length(): number {
    return this.recorded.length;
  }

  /** False once the engine reported that no further step satisfies the constraint. */
  get satisfiable(): boolean {
    return !this.unsatisfiable;
  }

  toTrace(description = 'Simulation Trace'): Trace {
    return traceOfStates(this.recorded, SIMULATION_TRACE_TYPE, description);
  }
}
