/**
 * Activity indicator for slow cluster calls. Writes in place on stderr and is a
 * no-op when stderr is not a TTY, so piped output and CI logs stay clean.
 */

const LINE_WIDTH = 80;
const LABEL_MAX_LEN = 60;
const FRAMES = ["|", "/", "-", "\\"];

let interval: NodeJS.Timeout | null = null;

function isTTY(): boolean {
  return typeof process.stderr.isTTY === "boolean" && process.stderr.isTTY;
}

export function startSpinner(label?: string): void {
  if (!isTTY()) return;
  if (interval) stopSpinner();

  let prefix = label ? `${label} ` : "";
  if (prefix.length > LABEL_MAX_LEN) {
    prefix = prefix.slice(0, LABEL_MAX_LEN - 2) + ".. ";
  }

  let frame = 0;
  interval = setInterval(() => {
    process.stderr.write(`\r${`${prefix}${FRAMES[frame]}`.padEnd(LINE_WIDTH)}\r`);
    frame = (frame + 1) % FRAMES.length;
  }, 100);
}

export function stopSpinner(): void {
  if (!interval) return;
  clearInterval(interval);
  interval = null;
  if (isTTY()) {
    process.stderr.write("\r" + " ".repeat(LINE_WIDTH) + "\r");
  }
}
