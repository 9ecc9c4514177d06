#!/usr/bin/env node
import { Command } from 'commander';

import type { FetchLike } from './modules/api/zoteroClient';
import { loadConfig, type SyncConfig } from './modules/config';
import { ConfigError } from './modules/errors';
import { createLogger, type LogSink } from './modules/logging';
import { SyncManager } from './sync/syncManager';

interface CliOptions {
	outputDir?: string;
	force?: boolean;
	dryRun?: boolean;
	groups: boolean;
	logLevel?: string;
	listLibraries?: boolean;
}

export interface MainOptions {
	argv?: string[];
	env?: NodeJS.ProcessEnv;
	fetch?: FetchLike;
	sleep?: (ms: number) => Promise<void>;
	sink?: LogSink;
}

function buildProgram(): Command {
	return new Command()
		.name('zotero-bib-sync')
		.description('Download your Zotero libraries as BibLaTeX when they changed since the last run')
		.option('-o, --output-dir <dir>', 'directory holding the .bib files (env BIBLIOGRAPHY_DIR)')
		.option('-f, --force', 'download even when the cached version is current')
		.option('--dry-run', 'only report which libraries changed')
		.option('--no-groups', 'skip group libraries')
		.option('--log-level <level>', 'debug, info, warn or error (env LOG_LEVEL)')
		.option('--list-libraries', 'print the libraries that would be synced and exit');
}

/** Returns the process exit code. */
export async function main(options: MainOptions = {}): Promise<number> {
	const program = buildProgram();
	program.parse(options.argv ?? process.argv);
	const opts = program.opts<CliOptions>();

	let config: SyncConfig;
	try {
		config = loadConfig(options.env ?? process.env, {
			outputDir: opts.outputDir,
			logLevel: opts.logLevel,
			includeGroups: opts.groups,
			force: opts.force,
			dryRun: opts.dryRun,
		});
	} catch (error) {
		if (error instanceof ConfigError) {
			createLogger('error', options.sink).error(error.message);
			return 1;
		}
		throw error;
	}

	const logger = createLogger(config.logLevel, options.sink);
	const manager = new SyncManager(config, logger, { fetch: options.fetch, sleep: options.sleep });

	if (opts.listLibraries) {
		for (const library of await manager.listLibraries()) {
			logger.info(`${library.label} -> ${library.outputName}`);
		}
		return 0;
	}

	const summary = await manager.run();
	return summary.failed ? 1 : 0;
}

if (require.main === module) {
	main()
		.then((code) => {
			process.exitCode = code;
		})
		.catch((err) => {
			console.error(err);
			process.exitCode = 1;
		});
}
