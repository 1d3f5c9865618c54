import {
	DiagnosticSeverity,
	type Diagnostic,
	type DiagnosticRelatedInformation,
	type Position,
	type PublishDiagnosticsParams,
	type Range,
} from 'vscode-languageserver/node';
import type { AnalysisError, ErrorCategory } from './analysisTypes';
import type { DocumentStore, SourceRange } from './documents';
import { AssertNever } from './utils';

export function toDiagnosticSeverity(category: ErrorCategory): DiagnosticSeverity {
	switch (category) {
		case 'error': return DiagnosticSeverity.Error;
		case 'warning': return DiagnosticSeverity.Warning;
		case 'info': return DiagnosticSeverity.Information;
		default: return AssertNever(category, `Unknown error category: ${String(category)}`);
	}
}

function clampPosition(p: Position): Position {
	return { line: Math.max(p.line, 0), character: Math.max(p.character, 0) };
}

const EMPTY_RANGE: Range = { start: { line: 0, character: 0 }, end: { line: 0, character: 0 } };

// Range of a location in a known document. Locations with inverted or negative offsets
// collapse to the start of the document.
function toRange(documents: DocumentStore, location: SourceRange): Range {
	const index = documents.lineIndex(location.sourceName);
	if (!index || location.start < 0 || location.start > location.end) return EMPTY_RANGE;
	return {
		start: clampPosition(index.offsetToPosition(location.start)),
		end: clampPosition(index.offsetToPosition(location.end)),
	};
}

export function formatMessage(error: AnalysisError): string {
	const detail = error.message?.trim();
	return detail ? `${error.typeName}: ${detail}` : `${error.typeName}:`;
}

/**
 * Groups engine errors into one report per known document, in store order. Every
 * document gets a report, an empty one included, so stale diagnostics are cleared.
 */
export function buildDiagnosticReports(errors: ReadonlyArray<AnalysisError>, documents: DocumentStore, source: string): PublishDiagnosticsParams[] {
	const byUnit = new Map<string, Diagnostic[]>();
	for (const name of documents.names()) byUnit.set(name, []);

	for (const error of errors) {
		const location = error.location;
		// protocol diagnostics are always attached to a single file
		if (!location) continue;
		const bucket = byUnit.get(location.sourceName);
		if (!bucket) continue;

		const diag: Diagnostic = {
			range: toRange(documents, location),
			severity: toDiagnosticSeverity(error.category),
			message: formatMessage(error),
			source,
			code: error.id,
		};
		const related: DiagnosticRelatedInformation[] = [];
		for (const s of error.secondary ?? []) {
			if (!documents.has(s.location.sourceName)) continue;
			related.push({
				message: s.message,
				location: { uri: documents.sourceUnitNameToClientPath(s.location.sourceName), range: toRange(documents, s.location) },
			});
		}
		if (related.length) diag.relatedInformation = related;
		bucket.push(diag);
	}

	return [...byUnit].map(([name, diagnostics]) => ({ uri: documents.sourceUnitNameToClientPath(name), diagnostics }));
}
