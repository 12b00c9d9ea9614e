const BLOCK_COMMENT_OPEN = ';/'
const BLOCK_COMMENT_CLOSE = '/;'
const LINE_COMMENT = ';'

export interface PreprocessOptions {
  /**
   * Fold lines ending in `\` into the following line
   * @default true
   */
  joinContinuations?: boolean
}

/**
 * Remove comments and blank lines from Papyrus source, then join
 * backslash-continued lines into logical lines.
 *
 * Block comments are tracked with a single flag, not a nesting parser:
 * a line holding `;/` opens, a line holding `/;` closes and is dropped.
 */
export function preprocess(rawText: string, options: PreprocessOptions = {}): string {
  const lines = stripComments(rawText.split(/\r\n|\r|\n/))
  const logical = options.joinContinuations === false ? lines : joinContinuations(lines)
  return logical.join('\n')
}

function stripComments(lines: string[]): string[] {
  const kept: string[] = []
  let inBlockComment = false

  for (const raw of lines) {
    if (raw.includes(BLOCK_COMMENT_OPEN)) {
      inBlockComment = true
    }
    if (raw.includes(BLOCK_COMMENT_CLOSE)) {
      inBlockComment = false
      continue
    }
    if (inBlockComment) {
      continue
    }

    const commentStart = raw.indexOf(LINE_COMMENT)
    const line = commentStart === -1 ? raw : raw.slice(0, commentStart)

    if (line.trim()) {
      kept.push(line)
    }
  }

  return kept
}

function joinContinuations(lines: string[]): string[] {
  const logical: string[] = []
  let buffer: string | null = null

  for (const line of lines) {
    const trimmed = line.trimEnd()
    const continues = trimmed.endsWith('\\')
    const body = continues ? trimmed.replace(/[\\\s]+$/, '') : line

    buffer = buffer === null ? body : `${buffer} ${body.trimStart()}`

    if (!continues) {
      logical.push(buffer)
      buffer = null
    }
  }

  // Unterminated continuation at end of input
  if (buffer !== null && buffer.trim()) {
    logical.push(buffer)
  }

  return logical
}
