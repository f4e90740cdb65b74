/**
 * Split a command line into argv words the way a POSIX shell does for plain
 * words: whitespace separates words, single quotes are literal, double quotes
 * allow `\"`, `\\`, `\$` and `` \` `` escapes, and a backslash outside quotes
 * escapes the next character.
 *
 * Examples:
 * - `xdg-open https://example.org` -> ["xdg-open", "https://example.org"]
 * - `notify-send "Profile switched" 'to games'` -> ["notify-send", "Profile switched", "to games"]
 * - `touch my\ file` -> ["touch", "my file"]
 *
 * Throws when a quote is left open.
 */
export function splitCommandLine(commandLine: string): string[] {
  const words: string[] = []
  let current = ''
  let inWord = false
  let quote: "'" | '"' | null = null

  for (let i = 0; i < commandLine.length; i++) {
    const char = commandLine[i]

    if (quote === "'") {
      if (char === "'") {
        quote = null
      } else {
        current += char
      }
      continue
    }

    if (quote === '"') {
      if (char === '"') {
        quote = null
      } else if (char === '\\' && i + 1 < commandLine.length && '"\\$`'.includes(commandLine[i + 1])) {
        current += commandLine[++i]
      } else {
        current += char
      }
      continue
    }

    if (char === "'" || char === '"') {
      quote = char
      inWord = true
      continue
    }

    if (char === '\\') {
      if (i + 1 < commandLine.length) {
        current += commandLine[++i]
      }
      inWord = true
      continue
    }

    if (/\s/.test(char)) {
      if (inWord) {
        words.push(current)
        current = ''
        inWord = false
      }
      continue
    }

    current += char
    inWord = true
  }

  if (quote) {
    throw new SyntaxError(`Unterminated ${quote === '"' ? 'double' : 'single'} quote in: ${commandLine}`)
  }

  if (inWord) {
    words.push(current)
  }

  return words
}
