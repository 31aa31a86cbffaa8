// Application layer: Compensating steps
// Writes that span stores run as a list of steps; when one fails, the steps
// already applied are undone in reverse order and the original error is rethrown.

import { errorMessage } from '@/utils/errors.js';

export interface CompensatedStep {
  name: string;
  apply(): Promise<void>;
  undo(): Promise<void>;
}

export async function runCompensated(tag: string, steps: readonly CompensatedStep[]): Promise<void> {
  const applied: CompensatedStep[] = [];

  for (const step of steps) {
    try {
      await step.apply();
      applied.push(step);
    } catch (error) {
      console.error(`[${tag}] Step "${step.name}" failed: ${errorMessage(error)}`);
      for (const done of applied.reverse()) {
        try {
          await done.undo();
        } catch (undoError) {
          console.error(`[${tag}] Could not undo "${done.name}": ${errorMessage(undoError)}`);
        }
      }
      throw error;
    }
  }
}
