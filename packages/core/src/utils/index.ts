import type { CompiledProject, ProjectLoader } from '../ports.js';

export class TimeoutError extends Error {
  constructor(public readonly timeoutMs: number, operation: string) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Rejects with a TimeoutError when `operation` does not settle in time. The
 * underlying call keeps running; only the caller stops waiting for it.
 */
export async function withTimeout<T>(operation: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(timeoutMs, label)), timeoutMs);
  });

  try {
    return await Promise.race([operation, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/** Loads the project, hands it to `task` and closes it on every exit path. */
export async function withProject<T>(loader: ProjectLoader, task: (project: CompiledProject) => Promise<T>): Promise<T> {
  const project = await loader.load();
  try {
    return await task(project);
  } finally {
    await project.close();
  }
}
