/**
 * Attribute reads against an accessibility handle
 *
 * Raw binding answers (an [error, value] pair or a bare value) are resolved
 * into a BindingResult here and nowhere else. Calling-convention fallback
 * is an explicit attempt chain, not exception-driven.
 */

import { CALLING_CONVENTIONS, type AccessibilityBinding, type AXHandle } from './binding.js';
import { ConventionMismatchError, describeError } from './errors.js';
import { silentReporter, type ProgressReporter } from './reporter.js';

export const AX_ROLE_ATTRIBUTE = 'AXRole';

// AXError codes (HIServices/AXError.h)
export const AX_ERROR_SUCCESS = 0;
export const AX_ERROR_FAILURE = -25200;
export const AX_ERROR_ILLEGAL_ARGUMENT = -25201;
export const AX_ERROR_INVALID_UI_ELEMENT = -25202;
export const AX_ERROR_CANNOT_COMPLETE = -25204;
export const AX_ERROR_ATTRIBUTE_UNSUPPORTED = -25205;
export const AX_ERROR_NOT_IMPLEMENTED = -25208;
export const AX_ERROR_API_DISABLED = -25211;
export const AX_ERROR_NO_VALUE = -25212;

// Answer seen from lazily-initializing apps while their tree is still being
// built. Classified as a partial warm-up, never as a hard failure.
export const AX_ERROR_TREE_NOT_READY = AX_ERROR_NO_VALUE;

// Not a platform code: the binding itself failed
export const AX_ERROR_BINDING_FAILURE = -1;

const AX_ERROR_NAMES: Record<number, string> = {
  [AX_ERROR_SUCCESS]: 'kAXErrorSuccess',
  [AX_ERROR_FAILURE]: 'kAXErrorFailure',
  [AX_ERROR_ILLEGAL_ARGUMENT]: 'kAXErrorIllegalArgument',
  [AX_ERROR_INVALID_UI_ELEMENT]: 'kAXErrorInvalidUIElement',
  [AX_ERROR_CANNOT_COMPLETE]: 'kAXErrorCannotComplete',
  [AX_ERROR_ATTRIBUTE_UNSUPPORTED]: 'kAXErrorAttributeUnsupported',
  [AX_ERROR_NOT_IMPLEMENTED]: 'kAXErrorNotImplemented',
  [AX_ERROR_API_DISABLED]: 'kAXErrorAPIDisabled',
  [AX_ERROR_NO_VALUE]: 'kAXErrorNoValue',
  [AX_ERROR_BINDING_FAILURE]: 'binding failure',
};

export function describeAXError(code: number): string {
  const name = AX_ERROR_NAMES[code];
  return name ? `${code} (${name})` : String(code);
}

export type BindingResult =
  | { ok: true; value: unknown }
  | { ok: false; code: number; reason?: string };

export type ConventionAttempt =
  | { kind: 'resolved'; result: BindingResult }
  | { kind: 'retry-with-other-convention'; reason: string }
  | { kind: 'hard-failure'; reason: string };

/**
 * Resolve a raw binding answer.
 * A two-element array led by an integer is (error, value); anything else is a bare value.
 */
export function normalizeRawResult(raw: unknown): BindingResult {
  if (Array.isArray(raw) && raw.length === 2) {
    const [code, value]: unknown[] = raw;
    if (typeof code === 'number' && Number.isInteger(code)) {
      return code === AX_ERROR_SUCCESS ? { ok: true, value } : { ok: false, code };
    }
  }
  return { ok: true, value: raw };
}

export async function tryConvention(call: () => Promise<unknown>): Promise<ConventionAttempt> {
  try {
    return { kind: 'resolved', result: normalizeRawResult(await call()) };
  } catch (error) {
    if (error instanceof ConventionMismatchError) {
      return { kind: 'retry-with-other-convention', reason: error.message };
    }
    return { kind: 'hard-failure', reason: describeError(error) };
  }
}

/**
 * Read one attribute, trying each calling convention in turn.
 * Never rejects: binding problems come back as AX_ERROR_BINDING_FAILURE.
 */
export async function readAttribute(
  binding: AccessibilityBinding,
  handle: AXHandle,
  attribute: string,
  reporter: ProgressReporter = silentReporter
): Promise<BindingResult> {
  for (const convention of CALLING_CONVENTIONS) {
    const attempt = await tryConvention(() => binding.copyAttributeValue(handle, attribute, convention));

    switch (attempt.kind) {
      case 'resolved':
        return attempt.result;
      case 'retry-with-other-convention':
        reporter.debug(`${attribute} read: ${attempt.reason}, trying next convention`);
        break;
      case 'hard-failure':
        reporter.debug(`${attribute} read failed (${convention}): ${attempt.reason}`);
        return { ok: false, code: AX_ERROR_BINDING_FAILURE, reason: attempt.reason };
    }
  }

  return {
    ok: false,
    code: AX_ERROR_BINDING_FAILURE,
    reason: `no supported calling convention for ${attribute}`,
  };
}
