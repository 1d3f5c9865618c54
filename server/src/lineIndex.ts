import type { Position } from 'vscode-languageserver/node';

/**
 * Line-break index of a text. Lines break at `\n` only; a `\r` before it stays part
 * of the line's content, so every offset in `[0, length]` has exactly one position.
 */
export class LineIndex {
	// offset of the first character of each line
	private readonly lineStarts: number[];

	constructor(private readonly text: string) {
		const starts = [0];
		for (let i = 0; i < text.length; i++) {
			if (text.charCodeAt(i) === 10) starts.push(i + 1);
		}
		this.lineStarts = starts;
	}

	get lineCount(): number {
		return this.lineStarts.length;
	}

	get length(): number {
		return this.text.length;
	}

	private lineStart(line: number): number {
		return this.lineStarts[line] ?? this.text.length;
	}

	// offset of the line's `\n`, or the end of text for the last line
	private lineEnd(line: number): number {
		const next = this.lineStarts[line + 1];
		return next === undefined ? this.text.length : next - 1;
	}

	positionToOffset(position: Position): number | undefined {
		const { line, character } = position;
		if (!Number.isInteger(line) || !Number.isInteger(character)) return undefined;
		if (line < 0 || character < 0 || line >= this.lineCount) return undefined;
		const offset = this.lineStart(line) + character;
		return offset <= this.lineEnd(line) ? offset : undefined;
	}

	offsetToPosition(offset: number): Position {
		const clamped = Number.isFinite(offset) ? Math.max(0, Math.min(Math.trunc(offset), this.text.length)) : 0;
		// last line whose start is <= offset
		let lo = 0, hi = this.lineStarts.length - 1;
		while (lo < hi) {
			const mid = (lo + hi + 1) >> 1;
			if (this.lineStart(mid) <= clamped) lo = mid; else hi = mid - 1;
		}
		return { line: lo, character: clamped - this.lineStart(lo) };
	}
}
