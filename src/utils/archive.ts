/**
 * Archive extraction utilities for gostrap
 * Unpacks .tar.gz release archives, through `sudo tar` when the destination is root-owned
 */

import * as tar from 'tar';
import type {
    ExtractOptions,
    IArchiveExtractor,
    ICommandRunner,
    IFileSystemManager,
    IProgressReporter,
} from '../interfaces.js';
import { ARCHIVE_EXTENSION } from '../constants.js';

export class TarArchiveExtractor implements IArchiveExtractor {
    constructor(
        private fileSystemManager: IFileSystemManager,
        private commandRunner: ICommandRunner,
        private progressReporter?: IProgressReporter
    ) { }

    /**
     * Extract a .tar.gz archive into destinationRoot, keeping its top-level directory
     * @param archivePath Path to the .tar.gz file
     * @param destinationRoot Directory to extract into
     */
    public async extract(archivePath: string, destinationRoot: string, options: ExtractOptions = {}): Promise<void> {
        if (!archivePath.endsWith(ARCHIVE_EXTENSION)) {
            throw new Error(`Unsupported archive format: ${archivePath}`);
        }
        if (!this.fileSystemManager.isFile(archivePath)) {
            throw new Error(`Archive not found: ${archivePath}`);
        }

        this.progressReporter?.startProgress(`Extracting ${archivePath}...`);
        try {
            if (options.elevated) {
                this.extractElevated(archivePath, destinationRoot);
            } else {
                this.fileSystemManager.ensureDirectory(destinationRoot);
                await tar.x({
                    file: archivePath,
                    cwd: destinationRoot,
                });
            }
            this.progressReporter?.finishProgress('Extraction completed successfully');
        } catch (error) {
            const failure = error instanceof Error ? error : new Error(String(error));
            this.progressReporter?.reportError(failure);
            throw failure;
        }
    }

    private extractElevated(archivePath: string, destinationRoot: string): void {
        const result = this.commandRunner.run('sudo', ['tar', '-C', destinationRoot, '-xzf', archivePath], {
            interactive: true,
        });
        if (result.error) {
            throw result.error;
        }
        if (result.exitCode !== 0) {
            throw new Error(`tar exited with status ${result.exitCode}`);
        }
    }
}
