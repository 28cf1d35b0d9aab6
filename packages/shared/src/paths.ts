import { URI } from "vscode-uri";

const FILE_URI_PREFIX = "file:";

export function isFileUri(value: string): boolean {
  return value.slice(0, FILE_URI_PREFIX.length).toLowerCase() === FILE_URI_PREFIX;
}

export function fsPathFromUri(uri: string): string {
  return URI.parse(uri).fsPath;
}

/**
 * Display form of a path as a user would type it: `file:` URIs become the
 * platform path, anything else is already a path and is returned unchanged.
 */
export function displayPath(pathOrUri: string): string {
  return isFileUri(pathOrUri) ? fsPathFromUri(pathOrUri) : pathOrUri;
}
