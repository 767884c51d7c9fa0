export type DebugLog = (...args: unknown[]) => void;

export const createDebugLog = (enabled: boolean): DebugLog => (...args) => {
  if (enabled) {
    console.log(...args);
  }
};

export const noopDebugLog: DebugLog = createDebugLog(false);
