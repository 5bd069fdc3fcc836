/**
 * Document sources — resolve a configuration identifier to a parsed tree.
 *
 * DirectoryDocumentSource: `<identifier>.json|.yaml|.yml` files on disk.
 * InMemoryDocumentSource: pre-parsed trees, for tests and embedding.
 */

import { readFile, readdir } from 'node:fs/promises';
import { extname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { ConfigurationNotFoundError, InvalidConfigurationFormatError } from '@logrelay/sdk';
import yaml from 'js-yaml';

/** Directory holding the documents shipped with the runtime */
export const BUILTIN_CONFIG_DIR = fileURLToPath(new URL('../configs', import.meta.url));

const EXTENSIONS: readonly string[] = ['.json', '.yaml', '.yml'];

// ─── Document Source Interface ────────────────────────────────────────────────

export interface DocumentSource {
	/**
	 * Resolve an identifier to its parsed tree.
	 *
	 * @throws ConfigurationNotFoundError when no document matches
	 * @throws InvalidConfigurationFormatError when the document does not parse
	 */
	resolve(identifier: string): Promise<unknown>;

	/** Identifiers this source can resolve, in a stable order */
	list(): Promise<string[]>;
}

// ─── Directory Source ─────────────────────────────────────────────────────────

function isMissing(err: unknown): boolean {
	return err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR');
}

/**
 * Parse document text by file extension.
 */
export function parseDocumentText(identifier: string, text: string, extension: string): unknown {
	try {
		return extension === '.json' ? JSON.parse(text) : yaml.load(text);
	} catch (err) {
		throw new InvalidConfigurationFormatError(
			identifier,
			[err instanceof Error ? err.message : String(err)],
			{ cause: err },
		);
	}
}

export interface DirectoryDocumentSourceOptions {
	/** Also search the built-in documents (default: true) */
	includeBuiltin?: boolean;
	/** Also search LOGRELAY_CONFIG_DIR when set (default: true) */
	includeEnv?: boolean;
}

/**
 * Finds documents in an ordered list of directories.
 * The first directory holding `<identifier>.<ext>` wins; extensions are
 * tried as .json, .yaml, .yml.
 */
export class DirectoryDocumentSource implements DocumentSource {
	readonly directories: string[];

	constructor(directories: string[] = [], options: DirectoryDocumentSourceOptions = {}) {
		const dirs = [...directories];
		const envDir = process.env.LOGRELAY_CONFIG_DIR;
		if ((options.includeEnv ?? true) && envDir) dirs.push(envDir);
		if (options.includeBuiltin ?? true) dirs.push(BUILTIN_CONFIG_DIR);
		this.directories = dirs;
	}

	/** Path of the file that resolves `identifier`, or null when there is none */
	async locate(identifier: string): Promise<string | null> {
		const found = await this.read(identifier);
		return found?.path ?? null;
	}

	async resolve(identifier: string): Promise<unknown> {
		const found = await this.read(identifier);
		if (!found) {
			throw new ConfigurationNotFoundError(
				identifier,
				`no ${EXTENSIONS.map((e) => `${identifier}${e}`).join(', ')} in ${this.directories.join(', ') || '(no directories)'}`,
			);
		}
		return parseDocumentText(identifier, found.text, extname(found.path));
	}

	async list(): Promise<string[]> {
		const seen = new Set<string>();
		for (const dir of this.directories) {
			let entries: string[];
			try {
				entries = await readdir(dir);
			} catch (err) {
				if (isMissing(err)) continue;
				throw err;
			}
			for (const entry of entries.sort()) {
				const ext = extname(entry);
				if (EXTENSIONS.includes(ext)) {
					seen.add(entry.slice(0, -ext.length));
				}
			}
		}
		return [...seen];
	}

	private async read(identifier: string): Promise<{ path: string; text: string } | null> {
		for (const dir of this.directories) {
			for (const ext of EXTENSIONS) {
				const path = join(dir, `${identifier}${ext}`);
				try {
					return { path, text: await readFile(path, 'utf-8') };
				} catch (err) {
					if (isMissing(err)) continue;
					throw err;
				}
			}
		}
		return null;
	}
}

// ─── In-Memory Source ─────────────────────────────────────────────────────────

export class InMemoryDocumentSource implements DocumentSource {
	private readonly documents = new Map<string, unknown>();

	constructor(documents: Record<string, unknown> = {}) {
		for (const [identifier, tree] of Object.entries(documents)) {
			this.documents.set(identifier, tree);
		}
	}

	/** Add or replace a document */
	set(identifier: string, tree: unknown): void {
		this.documents.set(identifier, tree);
	}

	async resolve(identifier: string): Promise<unknown> {
		if (!this.documents.has(identifier)) throw new ConfigurationNotFoundError(identifier);
		return structuredClone(this.documents.get(identifier));
	}

	async list(): Promise<string[]> {
		return [...this.documents.keys()];
	}
}
