import process from 'node:process';
import fs from 'node:fs';
import path from 'node:path';
import yaml from 'js-yaml';
import Ajv2020 from 'ajv/dist/2020';
import predefinedSchema from '../common/predefinedSchema.json';
import configSchema from '../common/configSchema.json';
import type { Compiler, Target } from './core/config';

export type MacroMap = Record<string, string>;

export interface PredefinedFile {
	version: number;
	common: MacroMap;
	targets: Record<Target, MacroMap>;
	compilers: Record<Compiler, MacroMap>;
}

const ajv = new Ajv2020({ allErrors: true, strict: false });
const validatePredefined = ajv.compile<PredefinedFile>(predefinedSchema);
const validateConfigData = ajv.compile(configSchema);

function schemaMessage(errors: typeof validatePredefined.errors): string {
	return (errors || []).map(e => `${e.instancePath} ${e.message}`).join('\n');
}

function predefinedCandidates(): string[] {
	const candidates: string[] = [];
	const envPath = process.env.CPREPROC_PREDEFINED;
	if (envPath && envPath.trim()) candidates.push(path.resolve(envPath.trim()));
	// from src/ and from dist/src/
	candidates.push(path.resolve(__dirname, '..', 'common', 'predefined-macros.yaml'));
	candidates.push(path.resolve(__dirname, '..', '..', 'common', 'predefined-macros.yaml'));
	return candidates;
}

export function parsePredefined(raw: string, source = '<inline>'): PredefinedFile {
	const obj: unknown = yaml.load(raw, { json: true });
	if (!validatePredefined(obj)) {
		throw new Error(`${source}: schema validation failed:\n${schemaMessage(validatePredefined.errors)}`);
	}
	return obj;
}

let cached: PredefinedFile | null = null;

export function loadPredefined(): PredefinedFile {
	if (cached) return cached;
	for (const candidate of predefinedCandidates()) {
		if (!fs.existsSync(candidate)) continue;
		cached = parsePredefined(fs.readFileSync(candidate, 'utf8'), candidate);
		return cached;
	}
	throw new Error(`predefined macro table not found (looked in ${predefinedCandidates().join(', ')})`);
}

/** Predefined object-like macros for a target/compiler pair, in definition order. */
export function predefinedMacros(target: Target, compiler: Compiler, file: PredefinedFile = loadPredefined()): [string, string][] {
	return [
		...Object.entries(file.targets[target]),
		...Object.entries(file.compilers[compiler]),
		...Object.entries(file.common),
	];
}

const FUNCTION_FIELDS = new Set(['onWarning', 'includeLoader', 'now']);

/** Throws when a configuration is not usable; data fields are checked against the JSON schema. */
export function validateConfig(config: object): void {
	const data: Record<string, unknown> = {};
	for (const [k, v] of Object.entries(config)) {
		if (v === undefined) continue;
		if (FUNCTION_FIELDS.has(k)) {
			if (typeof v !== 'function') throw new Error(`invalid preprocessor configuration: ${k} must be a function`);
			continue;
		}
		data[k] = v;
	}
	if (!validateConfigData(data)) {
		throw new Error(`invalid preprocessor configuration: schema validation failed:\n${schemaMessage(validateConfigData.errors)}`);
	}
}
