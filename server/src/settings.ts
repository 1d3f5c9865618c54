import Ajv2020 from 'ajv/dist/2020';
import schema from '../../common/serverSettingsSchema.json';
import { parseDisabledDiagList } from './diagSettings';
import { isObject } from './utils';

/** Shape accepted from the client, after the `bracketLsp` section has been merged in. */
export interface RawSettings {
	logFile?: string;
	debug?: boolean;
	diagnostics?: { disable?: string | (string | number)[] };
	brackets?: { pairs?: string; trailingWhitespace?: boolean; todoMarkers?: string[] };
}

export interface BracketSettings {
	// consecutive open/close characters, e.g. "()[]{}"
	pairs: string;
	trailingWhitespace: boolean;
	todoMarkers: string[];
}

export interface ServerSettings {
	logFile: string;
	debug: boolean;
	disabledCodes: ReadonlySet<number>;
	brackets: BracketSettings;
}

export const SETTINGS_SECTION = 'bracketLsp';

export function defaultSettings(): ServerSettings {
	return {
		logFile: '',
		debug: false,
		disabledCodes: new Set(),
		brackets: { pairs: '()[]{}', trailingWhitespace: true, todoMarkers: ['TODO', 'FIXME'] },
	};
}

const ajv = new Ajv2020({ allErrors: true, strict: false });
const validate = ajv.compile<RawSettings>(schema);

export type ResolvedSettings = { settings: ServerSettings; problems: string[] };

/**
 * Typed view over the opaque configuration object. Keys under `bracketLsp` win over
 * top-level ones; anything that fails the schema yields the defaults plus the reasons.
 */
export function resolveSettings(raw: unknown): ResolvedSettings {
	const defaults = defaultSettings();
	if (!isObject(raw)) return { settings: defaults, problems: [] };
	const section = raw[SETTINGS_SECTION];
	const merged: unknown = isObject(section) ? { ...raw, ...section } : raw;
	if (!validate(merged)) {
		const problems = (validate.errors || []).map(e => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`);
		return { settings: defaults, problems };
	}
	const brackets = merged.brackets ?? {};
	return {
		settings: {
			logFile: merged.logFile ?? defaults.logFile,
			debug: merged.debug ?? defaults.debug,
			disabledCodes: parseDisabledDiagList(merged.diagnostics?.disable),
			brackets: {
				pairs: brackets.pairs ?? defaults.brackets.pairs,
				trailingWhitespace: brackets.trailingWhitespace ?? defaults.brackets.trailingWhitespace,
				todoMarkers: brackets.todoMarkers ?? defaults.brackets.todoMarkers,
			},
		},
		problems: [],
	};
}
