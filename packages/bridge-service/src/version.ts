import { readFileSync } from 'fs';

// Read version from package.json at startup
let serviceVersion = '1.0.0';
try {
  const pkg: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    serviceVersion = pkg.version;
  }
} catch (err) {
  console.warn(`[HTTP] Could not read package version, using ${serviceVersion}: ${String(err)}`);
}

export function getServiceVersion(): string {
  return serviceVersion;
}
