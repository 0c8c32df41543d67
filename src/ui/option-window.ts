export const SELECTOR_WINDOW_SIZE = 10;

export type OptionWindow<T> = {
  startIndex: number;
  activeIndex: number;
  options: T[];
};

/** Keeps the active option near the middle of a fixed-size slice. */
export function getOptionWindow<T>(options: T[], index: number, size = SELECTOR_WINDOW_SIZE): OptionWindow<T> {
  const activeIndex = Math.max(0, Math.min(index, options.length - 1));
  if (options.length <= size) {
    return { startIndex: 0, activeIndex, options };
  }

  const halfWindow = Math.floor(size / 2);
  const maxStart = Math.max(0, options.length - size);
  const startIndex = Math.max(0, Math.min(activeIndex - halfWindow, maxStart));
  return {
    startIndex,
    activeIndex,
    options: options.slice(startIndex, startIndex + size),
  };
}

export function cycleIndex(current: number, direction: 1 | -1, count: number): number {
  if (count <= 0) {
    return 0;
  }
  return (current + direction + count) % count;
}
