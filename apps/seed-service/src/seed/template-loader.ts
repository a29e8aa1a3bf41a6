import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { ResultAsync, errAsync } from 'neverthrow';
import type { Logger } from '@solution-seeder/logging';
import { TemplateErrors, type TemplateError } from './errors.js';
import { parseTemplate, type Template } from './template.js';
import type { TemplateLoader } from './types.js';

/** Bundled templates: `apps/seed-service/data` */
export const DEFAULT_DATA_DIR = fileURLToPath(new URL('../../data', import.meta.url));

const URL_PATTERN = /^[a-z][a-z0-9+.-]*:\/\//i;

function errorCode(error: unknown): string | undefined {
	if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
		return error.code;
	}
	return undefined;
}

/**
 * Loads `<name>.json` from a data directory.
 */
export class FileTemplateLoader implements TemplateLoader {
	private readonly dataDir: string;
	private readonly logger: Logger;

	constructor(dataDir: string, logger: Logger) {
		this.dataDir = dataDir;
		this.logger = logger.child({ component: 'FileTemplateLoader' });
	}

	load(templateName: string): ResultAsync<Template, TemplateError> {
		if (URL_PATTERN.test(templateName)) {
			// TODO: fetch remote templates once the storage adapter exposes a template collection
			this.logger.warn({ templateName }, 'Remote templates are not supported');
			return errAsync(TemplateErrors.notFound(templateName));
		}

		if (templateName.includes('/') || templateName.includes('\\') || templateName.includes('..')) {
			return errAsync(
				TemplateErrors.invalidInput(
					templateName,
					'Invalid template name',
					new Error('Template names cannot contain path separators'),
				),
			);
		}

		const file = path.join(this.dataDir, `${templateName}.json`);

		return ResultAsync.fromPromise(readFile(file, 'utf8'), (error): TemplateError => {
			const code = errorCode(error);
			if (code === 'ENOENT' || code === 'ENOTDIR') {
				return TemplateErrors.notFound(templateName);
			}
			return TemplateErrors.invalidInput(templateName, 'Failed to read template', error);
		})
			.andThen((content) => parseTemplate(templateName, content))
			.map((template) => {
				this.logger.debug(
					{
						templateName,
						groups: template.groups.length,
						rules: template.rules.length,
						simulations: template.simulations.length,
					},
					'Template loaded',
				);
				return template;
			});
	}
}
