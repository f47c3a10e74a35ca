/**
 * telemorph version: Print version info.
 *
 * Shows telemorph version, node version, platform.
 */

import { readFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { Command } from 'commander';
import * as output from '../output.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

async function getVersion(): Promise<string> {
	try {
		// Walk up from commands/ to find package.json
		const pkgPath = resolve(__dirname, '..', '..', 'package.json');
		const pkg: unknown = JSON.parse(await readFile(pkgPath, 'utf-8'));
		if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
			return pkg.version;
		}
		return 'unknown';
	} catch {
		return 'unknown';
	}
}

export function registerVersionCommand(program: Command): void {
	program
		.command('version')
		.description('Print version info')
		.action(async () => {
			const version = await getVersion();

			if (output.isJsonMode()) {
				output.json({
					telemorph: version,
					node: process.version,
					platform: `${process.platform} ${process.arch}`,
				});
				return;
			}

			output.result(`telemorph ${version}`);
			output.result(`node      ${process.version}`);
			output.result(`platform  ${process.platform} ${process.arch}`);
		});
}
