const MIN_OUTPUT_HEIGHT = 8;
const MAX_OUTPUT_HEIGHT = 18;

/** First visible line for a panel. Every scroll mutation goes through here. */
export function clampScroll(totalLines: number, viewHeight: number, requested: number, follow: boolean): number {
  if (viewHeight <= 0) {
    return 0;
  }
  const maxStart = Math.max(0, totalLines - viewHeight);
  if (follow) {
    return maxStart;
  }
  return Math.min(Math.max(requested, 0), maxStart);
}

/**
 * Output view height: a third of the terminal, kept within [8, 18]. An
 * unknown height (0 or less) gives 8. `DashboardState.resize` keeps the last
 * known size when the terminal stops reporting one, so in the dashboard the
 * fallback only applies before any size has been seen.
 */
export function outputViewHeight(terminalHeight: number): number {
  if (!(terminalHeight > 0)) {
    return MIN_OUTPUT_HEIGHT;
  }
  const view = Math.floor(terminalHeight / 3);
  return Math.min(Math.max(view, MIN_OUTPUT_HEIGHT), MAX_OUTPUT_HEIGHT);
}
