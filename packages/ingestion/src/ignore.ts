export const DEFAULT_IGNORE_DIRS = new Set([
  ".git",
  ".data",
  "node_modules",
  "dist",
  "build",
  "coverage",
]);

export const DEFAULT_IGNORE_FILES = new Set([
  "package-lock.json",
  "npm-shrinkwrap.json",
]);

export const SUPPORTED_EXTENSIONS = new Set([".md", ".txt"]);
