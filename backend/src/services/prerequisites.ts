import { execFileSync } from 'node:child_process';
import { logger } from './logger.js';

export interface PrerequisiteResult {
  tool: string;
  available: boolean;
}

function isInstalled(tool: string): boolean {
  try {
    execFileSync('which', [tool], { encoding: 'utf-8', timeout: 3000 });
    return true;
  } catch {
    return false;
  }
}

/**
 * Check for the container runtime CLI and a socket listing tool, and log warnings for missing ones.
 * Does not block startup; a missing tool only degrades its port source.
 */
export function checkPrerequisites(runtime = 'docker'): PrerequisiteResult[] {
  const results: PrerequisiteResult[] = [runtime, 'netstat', 'ss'].map((tool) => ({
    tool,
    available: isInstalled(tool),
  }));

  if (!results[0].available) {
    logger.warn(`Container runtime '${runtime}' not found. Container ports will not be reported.`);
  }
  if (!results[1].available && !results[2].available) {
    logger.warn('Neither netstat nor ss found. Install with: sudo apt-get install -y net-tools');
  }

  return results;
}
