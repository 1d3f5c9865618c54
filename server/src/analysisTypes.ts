import type { SourceRange } from './documents';
import type { ServerSettings } from './settings';

export const BRACKET_DIAGCODES = {
	UNMATCHED_CLOSING: 1001,
	UNCLOSED_OPENING: 1002,
	MISMATCHED_BRACKET: 1003,
	UNTERMINATED_STRING: 1004,
	UNTERMINATED_COMMENT: 1005,
	TRAILING_WHITESPACE: 2001,
	TODO_MARKER: 3001,
} as const;

const DIAG_VALUE_SET = new Set<number>(Object.values(BRACKET_DIAGCODES));

// friendly name -> code, derived from the table above (UNMATCHED_CLOSING -> unmatched-closing)
const DIAG_NAME_MAP: Record<string, number> = Object.fromEntries(
	Object.entries(BRACKET_DIAGCODES).map(([name, code]) => [name.toLowerCase().replace(/_/g, '-'), code])
);

/**
 * Accepts `1003`, `"1003"` or `"mismatched-bracket"` (case and `-`/`_` insensitive).
 * Numeric codes outside the table are passed through so that codes of another engine
 * can be disabled as well.
 */
export function normalizeDiagCode(raw: string | number | null | undefined): number | null {
	if (raw === null || raw === undefined) return null;
	if (typeof raw === 'number') return Number.isInteger(raw) ? raw : null;
	const trimmed = raw.trim();
	if (!trimmed) return null;
	if (/^\d+$/.test(trimmed)) return Number(trimmed);
	const canon = trimmed.toLowerCase().replace(/_/g, '-');
	const code = DIAG_NAME_MAP[canon];
	return code !== undefined && DIAG_VALUE_SET.has(code) ? code : null;
}

export type ErrorCategory = 'error' | 'warning' | 'info';

export interface SecondaryLocation { message: string; location: SourceRange; }

/** One finding of the analysis engine. Offsets refer to the analysed text. */
export interface AnalysisError {
	category: ErrorCategory;
	// short kind shown in front of the message, e.g. "SyntaxError"
	typeName: string;
	id: number;
	message?: string;
	location?: SourceRange;
	secondary?: SecondaryLocation[];
}

export interface AnalysisEngine {
	/** Analyses all sources at once; `sources` maps source-unit name to full text. */
	analyze(sources: ReadonlyMap<string, string>, settings: ServerSettings): AnalysisError[];
}
