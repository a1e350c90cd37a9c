// Resolution order: PORTAL_SYNC_VERSION, IMAGE_VERSION, package.json, then 'dev'.
import { readFileSync } from 'node:fs';

function packageVersion(): string | undefined {
	try {
		const raw = readFileSync(new URL('../package.json', import.meta.url), 'utf8');
		const parsed: unknown = JSON.parse(raw);
		if (parsed && typeof parsed === 'object' && 'version' in parsed && typeof parsed.version === 'string') {
			return parsed.version;
		}
	} catch {
		// not packaged alongside package.json (e.g. copied dist only)
	}
	return undefined;
}

export const APP_VERSION: string =
	process.env.PORTAL_SYNC_VERSION || process.env.IMAGE_VERSION || packageVersion() || 'dev';
