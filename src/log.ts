let debugEnabled = process.env.HOOKCAST_DEBUG === "1";

export function setDebug(enabled: boolean): void {
  debugEnabled = enabled;
}

export function debug(tag: string, message: string): void {
  if (debugEnabled) console.debug(`[${tag}] ${message}`);
}
