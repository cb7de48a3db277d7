import dotenv from 'dotenv';

let loaded = false;

/**
 * Load `.env` into `process.env` once. Variables already set in the environment win.
 */
export function loadEnvironment(): void {
  if (!loaded) {
    dotenv.config();
    loaded = true;
  }
}
