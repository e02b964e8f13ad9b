#!/usr/bin/env node

import type { DescriptorFields } from './catalog/catalogTypes.js';
import { readDescriptorFile } from './catalog/readDescriptorFile.js';
import {
	loadOptionalConfig,
	resolveGeneratorConfig,
	type GeneratorConfig,
	type ParibindConfig,
} from './dx/config.js';
import { setDebugEnabled } from './dx/logger.js';
import { createHelpDocSource, loadDocFile, type DocSource } from './docs/docSource.js';
import { GeneratorError } from './errors.js';
import { checkOutputs } from './output/digest.js';
import { generateFiles, generateText } from './generator/run.js';
import type { GenerationReport } from './generator/functionGenerator.js';

function getFlagValue(argv: string[], name: string): string | undefined {
	const idx = argv.indexOf(name);
	if (idx === -1) return undefined;
	return argv[idx + 1];
}

function usage() {
	console.log(`paribind

Usage:
	paribind generate <pari.desc> [--out <dir>] [--docs <docs.json>]
	paribind check <pari.desc> [--out <dir>] [--docs <docs.json>]

Examples:
	npx paribind generate /usr/share/pari/pari.desc --out src/generated
	npx paribind check /usr/share/pari/pari.desc --out src/generated

Notes:
	- Settings are read from paribind.config.js in the current directory when present
	- Without --docs, method docs are taken from the catalog help strings
	- check exits with 1 when the generated files are missing or out of date
	- Set PARIBIND_DEBUG=1 to see why functions are skipped
`);
}

function fmtOk(msg: string) {
	return `✓ ${msg}`;
}

function fmtFail(msg: string) {
	return `✗ ${msg}`;
}

function docSourceFor(
	records: Map<string, DescriptorFields>,
	docsFile: string | undefined,
): DocSource {
	if (docsFile) return loadDocFile(docsFile);
	return createHelpDocSource(records.values());
}

function printSkipped(report: GenerationReport) {
	if (!report.skipped.length) return;
	console.log(`\nSkipped ${report.skipped.length} function(s) with unsupported prototypes:`);
	for (const s of report.skipped) console.log(`  - ${s.name}: ${s.reason}`);
}

async function main() {
	const [, , cmd, arg] = process.argv;

	if (!cmd || cmd === '-h' || cmd === '--help' || cmd === 'help') {
		usage();
		process.exit(0);
	}

	if (cmd !== 'generate' && cmd !== 'check') {
		console.error(`Unknown command: ${cmd}`);
		usage();
		process.exit(1);
	}

	if (!arg) {
		console.error('Missing catalog file (ex: pari.desc)');
		usage();
		process.exit(1);
	}

	const userConfig: ParibindConfig = (await loadOptionalConfig(process.cwd())) ?? {};
	if (userConfig.debug) setDebugEnabled(true);

	const outDir = getFlagValue(process.argv, '--out') ?? userConfig.outDir;
	const config: GeneratorConfig = resolveGeneratorConfig({ ...userConfig, outDir });
	const records = readDescriptorFile(arg);
	const docs = docSourceFor(records, getFlagValue(process.argv, '--docs') ?? userConfig.docsFile);

	if (cmd === 'generate') {
		process.stdout.write('Generating PARI functions:');
		const report = generateFiles(records.values(), {
			config,
			docs,
			onProgress: (e) => {
				process.stdout.write(e.type === 'accepted' ? ` ${e.name}` : ` (${e.name})`);
			},
		});
		process.stdout.write('\n');
		printSkipped(report);
		console.log(
			fmtOk(`Generated ${report.emitted.length} functions into ${config.outDir}`),
		);
		process.exit(0);
	}

	// check
	const { text } = generateText(records.values(), { config, docs });
	const stale = checkOutputs(config.outDir, config.files, text);
	if (!stale.length) {
		console.log(fmtOk(`Generated files in ${config.outDir} are up to date`));
		process.exit(0);
	}
	for (const s of stale) console.log(fmtFail(`${s.path} (${s.reason})`));
	console.log('\nRun `paribind generate` to refresh them.');
	process.exit(1);
}

main().catch((err: unknown) => {
	if (err instanceof GeneratorError) {
		console.error(`\n${fmtFail(err.message)}`);
	} else {
		console.error('[paribind]', err);
	}
	process.exit(1);
});
