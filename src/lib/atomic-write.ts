/**
 * Write-temp-then-rename file replacement.
 *
 * The temporary file lives next to the destination so the rename stays on
 * one filesystem. Readers see either the old contents or the new ones.
 */

import * as fs from 'fs';
import * as path from 'path';
import crypto from 'crypto';

export const TEMP_SUFFIX = '.tmp';

export function tempPathFor(target: string): string {
	const nonce = crypto.randomBytes(4).toString('hex');
	return path.join(path.dirname(target), `.${path.basename(target)}.${process.pid}.${nonce}${TEMP_SUFFIX}`);
}

export async function writeFileAtomic(target: string, contents: string, mode?: number): Promise<void> {
	await fs.promises.mkdir(path.dirname(target), { recursive: true });
	const tempPath = tempPathFor(target);

	try {
		const handle = await fs.promises.open(tempPath, 'w', mode);
		try {
			await handle.writeFile(contents, 'utf-8');
			await handle.sync();
		} finally {
			await handle.close();
		}
		await fs.promises.rename(tempPath, target);
	} catch (error) {
		await fs.promises.rm(tempPath, { force: true });
		throw error;
	}
}
