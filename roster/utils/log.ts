import "dotenv/config";

const DEBUG = process.env.ROSTER_DEBUG === "1";

export function debug(...args: unknown[]) {
  if (DEBUG) console.debug(...args);
}
