/**
 * One line of repository content that contains at least one non-ASCII character.
 */
export interface ContentLine {
  /** Repository-relative path, forward slashes */
  file: string;
  /** 1-based line number */
  lineNumber: number;
  /** Line text without its terminator */
  text: string;
}

/**
 * Enumerates non-ASCII lines of a repository.
 *
 * Each call to `lines()` re-runs the underlying scan from the start; a running
 * iteration cannot be resumed once abandoned.
 */
export interface ContentSource {
  /** Short identifier used in logs and events, e.g. `git` */
  readonly name: string;
  lines(): AsyncIterable<ContentLine>;
}
