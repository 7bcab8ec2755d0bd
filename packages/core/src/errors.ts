/**
 * packages/core/src/errors.ts — Error codes and error class.
 *
 * The DSL does not validate attribute combinations; the host engine rejects
 * those itself. The only failures raised here come from capability
 * resolution of custom node types that never reach a built-in node.
 */

/** Ways a custom node can fail to reach a built-in node during resolution. */
export type StrataErrorCode = "STRATA_UNRESOLVED_NODE" | "STRATA_RESOLVE_DEPTH_EXCEEDED";

/**
 * Thrown by `resolve*` and the `make*` translators when a custom node's
 * capability accessor returns the node itself, or when the chain of custom
 * nodes runs past `MAX_RESOLVE_DEPTH`. The message names the capability and
 * the custom node's class.
 */
export class StrataError extends Error {
  override readonly name = "StrataError";
  readonly code: StrataErrorCode;

  constructor(code: StrataErrorCode, message?: string) {
    super(message ?? code);
    this.code = code;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, StrataError);
    }
  }
}
