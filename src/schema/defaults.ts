// src/schema/defaults.ts

export const DEFAULT_PROJECT_NAME = 'myproject';
export const DEFAULT_DESCRIPTION = 'A new Python project';
export const DEFAULT_AUTHOR = 'Your Name';
export const DEFAULT_RUNTIME_VERSION = '3.14';

/**
 * Sentinel project name meaning "scaffold into the current directory".
 */
export const CURRENT_DIRECTORY_SENTINEL = '.';

/**
 * Entries tolerated in the working directory when scaffolding in place.
 * Matched with minimatch against each top-level entry name.
 */
export const DEFAULT_ALLOWED_ENTRIES: readonly string[] = ['.git'];
