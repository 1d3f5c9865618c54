import { type AnalysisEngine, type AnalysisError, BRACKET_DIAGCODES } from './analysisTypes';
import type { SourceRange } from './documents';
import type { BracketSettings, ServerSettings } from './settings';

type Opener = { ch: string; at: number };

/**
 * Default analysis engine: checks that brackets balance outside of string literals
 * and comments, and reports a few lexical problems on the way.
 */
export class BracketChecker implements AnalysisEngine {
	analyze(sources: ReadonlyMap<string, string>, settings: ServerSettings): AnalysisError[] {
		const out: AnalysisError[] = [];
		for (const [name, text] of sources) out.push(...checkSource(name, text, settings.brackets));
		return out;
	}
}

export function checkSource(name: string, text: string, opts: BracketSettings): AnalysisError[] {
	const closerOf = new Map<string, string>();
	const openerOf = new Map<string, string>();
	for (let i = 0; i + 1 < opts.pairs.length; i += 2) {
		closerOf.set(opts.pairs.charAt(i), opts.pairs.charAt(i + 1));
		openerOf.set(opts.pairs.charAt(i + 1), opts.pairs.charAt(i));
	}
	const errors: AnalysisError[] = [];
	const loc = (start: number, end: number): SourceRange => ({ sourceName: name, start, end });

	const scanMarkers = (from: number, to: number) => {
		const body = text.slice(from, to);
		for (const marker of opts.todoMarkers) {
			for (let at = body.indexOf(marker); at >= 0; at = body.indexOf(marker, at + marker.length)) {
				errors.push({
					category: 'info', typeName: 'Info', id: BRACKET_DIAGCODES.TODO_MARKER,
					message: `${marker} marker.`, location: loc(from + at, from + at + marker.length),
				});
			}
		}
	};
	// offset of the next '\n' at or after `from`, or end of text
	const lineEnd = (from: number) => {
		const nl = text.indexOf('\n', from);
		return nl < 0 ? text.length : nl;
	};

	const stack: Opener[] = [];
	let i = 0;
	while (i < text.length) {
		const ch = text.charAt(i);
		const next = text.charAt(i + 1);

		if (ch === '/' && next === '/') {
			const end = lineEnd(i);
			scanMarkers(i + 2, end);
			i = end;
			continue;
		}
		if (ch === '/' && next === '*') {
			const close = text.indexOf('*/', i + 2);
			if (close < 0) {
				errors.push({
					category: 'error', typeName: 'SyntaxError', id: BRACKET_DIAGCODES.UNTERMINATED_COMMENT,
					message: 'Unterminated block comment.', location: loc(i, i + 2),
				});
				scanMarkers(i + 2, text.length);
				break;
			}
			scanMarkers(i + 2, close);
			i = close + 2;
			continue;
		}
		if (ch === '"' || ch === '\'') {
			let j = i + 1;
			while (j < text.length) {
				const c = text.charAt(j);
				// an escape never carries the literal past the end of the line
				if (c === '\\' && text.charAt(j + 1) !== '\n') { j += 2; continue; }
				if (c === ch || c === '\n') break;
				j++;
			}
			if (j < text.length && text.charAt(j) === ch) {
				i = j + 1;
				continue;
			}
			let end = Math.min(j, text.length);
			if (text.charAt(end - 1) === '\r' && end - 1 > i) end--;
			errors.push({
				category: 'error', typeName: 'SyntaxError', id: BRACKET_DIAGCODES.UNTERMINATED_STRING,
				message: 'Unterminated string literal.', location: loc(i, end),
			});
			i = Math.min(j, text.length);
			continue;
		}

		if (closerOf.has(ch)) {
			stack.push({ ch, at: i });
		} else if (openerOf.has(ch)) {
			const top = stack[stack.length - 1];
			if (!top) {
				errors.push({
					category: 'error', typeName: 'BracketError', id: BRACKET_DIAGCODES.UNMATCHED_CLOSING,
					message: `Unmatched closing '${ch}'.`, location: loc(i, i + 1),
				});
			} else {
				const expected = closerOf.get(top.ch) ?? '';
				if (expected !== ch) {
					errors.push({
						category: 'error', typeName: 'BracketError', id: BRACKET_DIAGCODES.MISMATCHED_BRACKET,
						message: `Expected '${expected}' but found '${ch}'.`, location: loc(i, i + 1),
						secondary: [{ message: 'Opening bracket is here.', location: loc(top.at, top.at + 1) }],
					});
				}
				stack.pop();
			}
		}
		i++;
	}

	for (const open of stack) {
		errors.push({
			category: 'error', typeName: 'BracketError', id: BRACKET_DIAGCODES.UNCLOSED_OPENING,
			message: `'${open.ch}' is never closed.`, location: loc(open.at, open.at + 1),
		});
	}

	if (opts.trailingWhitespace) {
		let start = 0;
		for (const raw of text.split('\n')) {
			const content = raw.endsWith('\r') ? raw.slice(0, -1) : raw;
			const m = /[ \t]+$/.exec(content);
			if (m) {
				errors.push({
					category: 'warning', typeName: 'Warning', id: BRACKET_DIAGCODES.TRAILING_WHITESPACE,
					message: 'Trailing whitespace.', location: loc(start + m.index, start + content.length),
				});
			}
			start += raw.length + 1;
		}
	}

	return errors.sort((a, b) => (a.location?.start ?? 0) - (b.location?.start ?? 0));
}
