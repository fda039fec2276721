// apps/cli/src/ui/spinner.ts: progress spinner wrapper using ora
import ora from "ora";
import type { Ora } from "ora";

export interface Spinner {
  start(text: string): void;
  update(text: string): void;
  succeed(text: string): void;
  fail(text: string): void;
}

/** A spinner on stderr; every call is a no-op when `enabled` is false. */
export function createSpinner(enabled = true): Spinner {
  let instance: Ora | undefined;

  return {
    start(text: string) {
      if (enabled) instance = ora({ text, stream: process.stderr }).start();
    },
    update(text: string) {
      if (instance) instance.text = text;
    },
    succeed(text: string) {
      instance?.succeed(text);
    },
    fail(text: string) {
      instance?.fail(text);
    },
  };
}
