export const DEFAULT_STAGING_DIRECTORY = "projects";

const READ_FILE_FROM_WORKSPACE_PATTERN = /readFileFromWorkspace\('([^'\r\n]*)'\)/g;
const CURRENT_DIRECTORY_MARKER = "./";

export interface RewriteOptions {
  stagingDirectory?: string;
}

interface Replacement {
  readonly start: number;
  readonly end: number;
  readonly text: string;
}

/**
 * Rewrites `readFileFromWorkspace('./path')` calls so they read
 * `./<staging>/<source>/path` directly once the script no longer runs from
 * its repository checkout. Calls with another quote style or without a
 * closing parenthesis are left as they are.
 */
export function rewriteWorkspaceReferences(
  source: string,
  text: string,
  options: RewriteOptions = {},
): string {
  const stagingDirectory = options.stagingDirectory ?? DEFAULT_STAGING_DIRECTORY;
  const replacements: Replacement[] = [];

  for (const match of text.matchAll(READ_FILE_FROM_WORKSPACE_PATTERN)) {
    const start = match.index ?? 0;
    replacements.push({
      start,
      end: start + match[0].length,
      text: toFileReadExpression(
        relocatePath(match[1] ?? "", stagingDirectory, source),
      ),
    });
  }

  if (replacements.length === 0) {
    return text;
  }

  // Splice by offset into the input text so a replacement is never
  // matched again.
  let output = "";
  let cursor = 0;
  for (const replacement of replacements) {
    output += text.slice(cursor, replacement.start) + replacement.text;
    cursor = replacement.end;
  }
  return output + text.slice(cursor);
}

export function relocatePath(
  path: string,
  stagingDirectory: string,
  source: string,
): string {
  if (!path.startsWith(CURRENT_DIRECTORY_MARKER)) {
    return path;
  }

  const remainder = path.slice(CURRENT_DIRECTORY_MARKER.length);
  return `./${stagingDirectory}/${source}/${remainder}`;
}

function toFileReadExpression(path: string): string {
  return `new File('${path}').text`;
}
