#!/usr/bin/env node
import 'source-map-support/register.js';
import { BracketChecker } from './checker';
import { Logger } from './logger';
import { LanguageServer } from './server';
import { JsonTransport } from './transport';

const logger = new Logger();
const transport = new JsonTransport(process.stdin, process.stdout, {
	onOutputError: e => logger.error(`cannot write to client: ${e.message}`),
});
const server = new LanguageServer(transport, new BracketChecker(), { logger });

server.run().then(
	shutdownRequested => {
		// LSP: exit code 0 only when `exit` follows `shutdown`
		process.exitCode = shutdownRequested ? 0 : 1;
		// release stdin so the event loop can drain once pending writes are flushed
		process.stdin.destroy();
	},
	(e: unknown) => {
		logger.error(`server loop failed: ${e instanceof Error && e.stack ? e.stack : String(e)}`);
		process.exitCode = 1;
	},
);
