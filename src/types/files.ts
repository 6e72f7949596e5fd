/**
 * File-related type definitions
 */

/**
 * Operations a file can go through on its way to the distribution tree
 */
export const OPERATION_KINDS = [
  "compile",
  "minify-markup",
  "minify-script",
  "minify-style",
  "copy",
] as const;

export type OperationKind = (typeof OPERATION_KINDS)[number];

/**
 * Operations delegated to an external executable
 */
export type ExternalOperation = Exclude<OperationKind, "copy">;

/**
 * Closed set of extensions the registry knows how to transform
 */
export const SUPPORTED_EXTENSIONS = [
  ".py",
  ".html",
  ".htm",
  ".js",
  ".mjs",
  ".css",
] as const;

export type SupportedExtension = (typeof SUPPORTED_EXTENSIONS)[number];

export interface FileEntry {
  absolutePath: string;
  relativePath: string; // Relative to the walked root
  extension: string; // Lowercased, with leading dot ("" when none)
}

export interface TransformSpec {
  matchExtension: string;
  destinationExtension: string | null; // Null keeps the source extension
  operation: OperationKind;
}
