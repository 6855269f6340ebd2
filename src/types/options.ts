/**
 * Per-call configuration for load and save.
 */
export interface CodecOptions {
  /** Fail on continued-packet flags that disagree with the lacing instead of warning. */
  readonly strict?: boolean;
  /** Receives recoverable framing problems. Defaults to `console.warn`. */
  readonly onWarning?: (message: string) => void;
}

export type WarningSink = (message: string) => void;

export const defaultWarningSink: WarningSink = (message: string): void => {
  console.warn(message);
};
