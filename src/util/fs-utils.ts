// src/util/fs-utils.ts

import fs from 'fs';
import path from 'path';

/**
 * Convert any path to a POSIX-style path with forward slashes.
 */
export function toPosixPath(p: string): string {
   return p.replace(/\\/g, '/');
}

/**
 * Ensure a directory exists (like mkdir -p).
 * Returns the absolute path of the directory.
 */
export function ensureDirSync(dirPath: string): string {
   if (!fs.existsSync(dirPath)) {
      fs.mkdirSync(dirPath, { recursive: true });
   }
   return dirPath;
}

/**
 * Write a UTF-8 file, creating parent directories if needed.
 * Errors are not caught here.
 */
export function writeFileEnsuringDirSync(filePath: string, contents: string): void {
   ensureDirSync(path.dirname(filePath));
   fs.writeFileSync(filePath, contents, 'utf8');
}

/**
 * Resolve an absolute path from projectRoot + relative path,
 * and assert it stays within the project root.
 *
 * Throws if the resolved path escapes the project root.
 */
export function resolveProjectPath(projectRoot: string, relPath: string): string {
   const absRoot = path.resolve(projectRoot);
   const absTarget = path.resolve(absRoot, relPath);

   const rootWithSep = absRoot.endsWith(path.sep) ? absRoot : absRoot + path.sep;
   if (!absTarget.startsWith(rootWithSep) && absTarget !== absRoot) {
      throw new Error(
         `Attempted to resolve path outside project root: ` +
         `root="${absRoot}", target="${absTarget}"`,
      );
   }

   return absTarget;
}

/**
 * Convert an absolute path back to a project-relative POSIX path.
 * Throws if the path is not under projectRoot.
 */
export function toProjectRelativePath(projectRoot: string, absolutePath: string): string {
   const absRoot = path.resolve(projectRoot);
   const absTarget = path.resolve(absolutePath);

   const rootWithSep = absRoot.endsWith(path.sep) ? absRoot : absRoot + path.sep;
   if (!absTarget.startsWith(rootWithSep) && absTarget !== absRoot) {
      throw new Error(
         `Path "${absTarget}" is not inside project root "${absRoot}".`,
      );
   }

   return toPosixPath(path.relative(absRoot, absTarget));
}

/**
 * Recursively list files under a directory as POSIX paths relative to it.
 * Result is sorted so callers get a stable order.
 */
export function listFilesRecursiveSync(rootDir: string): string[] {
   const out: string[] = [];

   function walk(dir: string) {
      for (const dirent of fs.readdirSync(dir, { withFileTypes: true })) {
         const abs = path.join(dir, dirent.name);
         if (dirent.isDirectory()) {
            walk(abs);
         } else if (dirent.isFile()) {
            out.push(toProjectRelativePath(rootDir, abs));
         }
      }
   }

   walk(rootDir);
   return out.sort();
}
