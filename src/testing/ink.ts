const ANSI_PATTERN = /\u001B\[[0-9;]*m/g;

/** Frame text without colour codes, so assertions see what the terminal shows. */
export function plainFrame(frame: string | undefined): string {
  return (frame ?? "").replace(ANSI_PATTERN, "");
}

export function nextTick(ms = 30): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
