import type { InvocationOutcome, InvocationTarget, ProcessRunner } from '../../src/dispatch/types.js';

/** Records every target it is asked to run and answers with a fixed outcome. */
export class FakeRunner implements ProcessRunner {
  readonly calls: InvocationTarget[] = [];

  constructor(private readonly outcome: InvocationOutcome) {}

  async run(target: InvocationTarget): Promise<InvocationOutcome> {
    this.calls.push(target);
    return this.outcome;
  }
}

export const OK_OUTCOME: InvocationOutcome = { status: 'succeeded', stdout: 'OK', stderr: 'noise' };
