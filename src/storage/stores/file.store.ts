/**
 * File Progress Store
 *
 * One JSON document per category:
 *   <dir>/current.json
 *   <dir>/completed.json
 *
 * Every save writes its own temp file and renames it over the document,
 * so overlapping saves and crashes mid-save never leave a partial
 * document. The last rename wins. A missing document reads as empty data.
 */

import { mkdir, readFile, rename, rm, writeFile } from 'fs/promises';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { ProgressStoreError } from '../../engine/quest/errors.js';
import type { ProgressData } from '../../schema/quest.js';
import { createLogger, createTimer, getErrorMessage } from '../../utils/logger.js';
import { err, ok } from '../../utils/result.js';
import {
    abortedError,
    validateProgressData,
    type ProgressCategory,
    type ProgressStore,
    type StoreOptions,
    type StoreResult
} from '../progress-store.js';

const log = createLogger('Store').child('File');

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

async function discard(temp: string): Promise<void> {
    try {
        await rm(temp, { force: true });
    } catch (error) {
        log.warn(`Could not remove ${temp}: ${getErrorMessage(error)}`);
    }
}

export class FileProgressStore implements ProgressStore {
    private readonly files: Record<ProgressCategory, string>;

    constructor(directory: string);
    constructor(currentFile: string, completedFile: string);
    constructor(directoryOrCurrent: string, completedFile?: string) {
        this.files = completedFile === undefined
            ? {
                current: path.join(directoryOrCurrent, 'current.json'),
                completed: path.join(directoryOrCurrent, 'completed.json')
            }
            : { current: directoryOrCurrent, completed: completedFile };
    }

    saveCurrentQuestData(data: ProgressData, options?: StoreOptions): Promise<StoreResult<void>> {
        return this.save('current', data, options);
    }

    loadCurrentQuestData(options?: StoreOptions): Promise<StoreResult<ProgressData>> {
        return this.load('current', options);
    }

    saveCompletedQuestData(data: ProgressData, options?: StoreOptions): Promise<StoreResult<void>> {
        return this.save('completed', data, options);
    }

    loadCompletedQuestData(options?: StoreOptions): Promise<StoreResult<ProgressData>> {
        return this.load('completed', options);
    }

    private async save(category: ProgressCategory, data: ProgressData, options?: StoreOptions): Promise<StoreResult<void>> {
        const file = this.files[category];
        const temp = `${file}.${uuidv4()}.tmp`;
        const timer = createTimer(log);

        try {
            await mkdir(path.dirname(file), { recursive: true });
            await writeFile(temp, JSON.stringify(data, null, 2), { encoding: 'utf8', signal: options?.signal });
            if (options?.signal?.aborted) {
                await discard(temp);
                return err(abortedError(category));
            }
            await rename(temp, file);
        } catch (error) {
            await discard(temp);
            if (options?.signal?.aborted) {
                return err(abortedError(category));
            }
            log.error(`Failed to save ${category} progress to ${file}: ${getErrorMessage(error)}`);
            return err(new ProgressStoreError(`Cannot write ${category} progress to ${file}`, 'io', error));
        }

        timer.done(`Saved ${category} progress for ${Object.keys(data).length} questers`);
        return ok(undefined);
    }

    private async load(category: ProgressCategory, options?: StoreOptions): Promise<StoreResult<ProgressData>> {
        const file = this.files[category];

        let text: string;
        try {
            text = await readFile(file, { encoding: 'utf8', signal: options?.signal });
        } catch (error) {
            if (isMissingFile(error)) {
                log.debug(`No ${category} progress at ${file} yet`);
                return ok({});
            }
            if (options?.signal?.aborted) {
                return err(abortedError(category));
            }
            log.error(`Failed to read ${category} progress from ${file}: ${getErrorMessage(error)}`);
            return err(new ProgressStoreError(`Cannot read ${category} progress from ${file}`, 'io', error));
        }

        let raw: unknown;
        try {
            raw = JSON.parse(text);
        } catch (error) {
            log.error(`${file} is not valid JSON`);
            return err(new ProgressStoreError(`Stored ${category} progress in ${file} is not valid JSON`, 'decode', error));
        }
        return validateProgressData(raw, category);
    }
}
