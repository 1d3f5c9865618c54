import { type AnalysisError, normalizeDiagCode } from './analysisTypes';

// Parse user-provided disabled diagnostics (codes or friendly names) into numeric codes.
export function parseDisabledDiagList(input: unknown): Set<number> {
	const out = new Set<number>();
	const push = (raw: unknown) => {
		if (typeof raw !== 'string' && typeof raw !== 'number') return;
		const norm = normalizeDiagCode(raw);
		if (norm !== null) out.add(norm);
	};
	if (Array.isArray(input)) {
		for (const it of input) push(it);
		return out;
	}
	if (typeof input === 'string') {
		for (const token of input.split(/[,\s]+/)) {
			if (!token) continue;
			push(token);
		}
	}
	return out;
}

// Filter engine errors using the disabled set; returns a new array.
export function filterErrors(errors: ReadonlyArray<AnalysisError>, disabled: ReadonlySet<number>): AnalysisError[] {
	if (!disabled.size) return [...errors];
	return errors.filter(e => !disabled.has(e.id));
}
