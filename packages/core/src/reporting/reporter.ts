/**
 * Stint Core — Reporter Interface
 *
 * Two output channels for side-effect messages emitted by the core:
 *
 *   inform — one-word progress lines ("BEGIN", "END"); the CLI suppresses
 *            these under --quiet
 *   warn   — a tolerated anomaly that the operation proceeded over anyway
 *
 * The CLI provides a console implementation. When no reporter is injected
 * (tests, embedded use) the core uses SILENT_REPORTER.
 */
export interface Reporter {
  inform(message: string): void;
  warn(message: string): void;
}

export const SILENT_REPORTER: Reporter = {
  inform: () => {},
  warn: () => {},
};
