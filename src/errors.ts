/**
 * Fatal vs best-effort failures. PluginError always aborts the run;
 * best-effort calls go through settle() and are logged by the caller.
 */

export type PluginErrorKind =
  | "CONFIG"
  | "TEMPLATE"
  | "IDENTITY"
  | "FETCH"
  | "RESOLUTION"
  | "STATUS"
  | "PUBLISH";

export class PluginError extends Error {
  readonly kind: PluginErrorKind;

  constructor(kind: PluginErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PluginError";
    this.kind = kind;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Run a remote call whose failure is fatal, tagging the error with its kind. */
export async function fatal<T>(
  kind: PluginErrorKind,
  what: string,
  call: () => Promise<T>,
): Promise<T> {
  try {
    return await call();
  } catch (err) {
    if (err instanceof PluginError) throw err;
    throw new PluginError(kind, `${what}: ${errorMessage(err)}`, { cause: err });
  }
}

export type Settled<T> = { ok: true; value: T } | { ok: false; error: unknown };

/** Run a remote call whose failure the caller recovers from. Never throws. */
export async function settle<T>(call: () => Promise<T>): Promise<Settled<T>> {
  try {
    return { ok: true, value: await call() };
  } catch (error) {
    return { ok: false, error };
  }
}
