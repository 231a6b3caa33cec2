/**
 * Turns arbitrary text chunks into lines. `\n` separates lines and a trailing `\r` is
 * dropped. A final newline does not produce an extra empty line.
 */
export class LineSplitter {
  private carry = '';

  push(chunk: string): string[] {
    if (!chunk) return [];
    const parts = (this.carry + chunk).split('\n');
    this.carry = parts.pop() ?? '';
    return parts.map(stripCarriageReturn);
  }

  end(): string[] {
    const rest = this.carry;
    this.carry = '';
    return rest ? [stripCarriageReturn(rest)] : [];
  }
}

function stripCarriageReturn(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}

export function splitLines(text: string): string[] {
  const splitter = new LineSplitter();
  return [...splitter.push(text), ...splitter.end()];
}
