import type { Instance } from 'ink';

/** Why the Ink app stopped rendering. */
export type AppExit = { kind: 'exit' } | { kind: 'edit' };

export type RuntimeLifecycle = {
  readonly promise: Promise<AppExit>;
  readonly handleComplete: (exit: AppExit) => void;
  readonly handleError: (error: unknown) => void;
  readonly observeExit: (app: Pick<Instance, 'waitUntilExit'>) => void;
};

// Settles exactly once: the first of quit, edit request, Ink exit or Ink error wins.
export function createRuntimeLifecycle(): RuntimeLifecycle {
  let settled = false;
  let resolvePromise: ((exit: AppExit) => void) | undefined;
  let rejectPromise: ((error: unknown) => void) | undefined;

  const promise = new Promise<AppExit>((resolve, reject) => {
    resolvePromise = (exit: AppExit) => {
      if (!settled) {
        settled = true;
        resolve(exit);
      }
    };
    rejectPromise = (error: unknown) => {
      if (!settled) {
        settled = true;
        reject(error);
      }
    };
  });

  const handleComplete = (exit: AppExit) => {
    resolvePromise?.(exit);
  };

  const handleError = (error: unknown) => {
    rejectPromise?.(error);
  };

  // Ctrl+C unmounts the app; treat that as a quit.
  const observeExit = (app: Pick<Instance, 'waitUntilExit'>) => {
    app.waitUntilExit().then(
      () => handleComplete({ kind: 'exit' }),
      (error: unknown) => handleError(error),
    );
  };

  return { promise, handleComplete, handleError, observeExit };
}
