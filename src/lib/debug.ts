// Debug mode flag - can be enabled to log detailed pipeline info
let debugMode = false;

export function setDebugMode(enabled: boolean): void {
  debugMode = enabled;
}

export function isDebugMode(): boolean {
  return debugMode;
}

export function debugLog(stage: string, ...args: unknown[]): void {
  if (debugMode) {
    console.log(`[QR DEBUG] ${stage}:`, ...args);
  }
}
