import fs from 'node:fs';
import type { ServerSettings } from './settings';
import { errorMessage } from './utils';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogSink = (line: string) => void;

const PREFIX = '[bracket-lsp]';

// stdout belongs to the protocol, so the console side of logging goes to stderr.
const stderrSink: LogSink = line => console.error(line);

export class Logger {
	private logFile = '';
	private debugEnabled = false;
	private fileFailed = false;

	constructor(private readonly sink: LogSink = stderrSink) {}

	configure(settings: Pick<ServerSettings, 'logFile' | 'debug'>): void {
		if (settings.logFile !== this.logFile) this.fileFailed = false;
		this.logFile = settings.logFile;
		this.debugEnabled = settings.debug;
	}

	debug(message: string): void {
		if (this.debugEnabled) this.write('debug', message);
	}

	info(message: string): void {
		this.write('info', message);
	}

	warn(message: string): void {
		this.write('warn', message);
	}

	error(message: string): void {
		this.write('error', message);
	}

	private write(level: LogLevel, message: string): void {
		const line = `${PREFIX} ${level}: ${message}`;
		this.sink(line);
		if (!this.logFile || this.fileFailed) return;
		try {
			fs.appendFileSync(this.logFile, `${new Date().toISOString()} ${line}\n`);
		} catch (e) {
			// report once per configured file
			this.fileFailed = true;
			this.sink(`${PREFIX} error: cannot append to log file ${this.logFile}: ${errorMessage(e)}`);
		}
	}
}
