import { LabelDecodeError, parseLanguageCode } from "@/labels";
import type { LanguageCode } from "@/types";

/**
 * Coerce a tool's language argument. Unknown codes degrade to `fallback`
 * with a warning; the engine itself never sees an unknown code.
 */
export function resolveLanguage(
  code: string | undefined,
  fallback: LanguageCode,
): LanguageCode {
  if (code === undefined) {
    return fallback;
  }

  try {
    return parseLanguageCode(code);
  } catch (error) {
    if (error instanceof LabelDecodeError) {
      console.warn(
        `[destinations] ${error.message}, using "${fallback}" instead`,
      );
      return fallback;
    }
    throw error;
  }
}
