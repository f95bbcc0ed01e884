export interface Reporter {
  heading(text: string): void;
  step(index: number, total: number, title: string): void;
  success(text: string): void;
  info(text: string): void;
  warn(text: string): void;
  failure(text: string): void;
  /** Writes text as-is, e.g. installer output. */
  passthrough(text: string): void;
}

export function createLineReporter(write: (line: string) => void): Reporter {
  return {
    heading: (text) => write(`=== ${text} ===`),
    step: (index, total, title) => write(`[${index}/${total}] ${title}...`),
    success: (text) => write(`✓ ${text}`),
    info: (text) => write(`  ${text}`),
    warn: (text) => write(`⚠ ${text}`),
    failure: (text) => write(`✗ ${text}`),
    passthrough: (text) => {
      if (text.length > 0) write(text.endsWith('\n') ? text.slice(0, -1) : text);
    },
  };
}

export const consoleReporter: Reporter = createLineReporter((line) => {
  process.stdout.write(line + '\n');
});
