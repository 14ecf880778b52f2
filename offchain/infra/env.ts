import fs from 'fs';
import path from 'path';
import { config as loadDotenv } from 'dotenv';
import { expand } from 'dotenv-expand';

// Load .env from project root (.. from offchain/) or current working dir fallback
const ROOT = path.resolve(__dirname, '..', '..');
const CANDIDATES = [
  path.join(ROOT, '.env'),
  path.resolve(process.cwd(), '.env'),
];

// Values exported by the process manager win over the file.
const PRESERVE_KEYS = ['REDIS_URL', 'EXECUTION_MODE', 'EXECUTION_HOST', 'EXECUTION_PORT', 'PROM_PORT'];

const preserved: Record<string, string | undefined> = {};
for (const key of PRESERVE_KEYS) {
  preserved[key] = process.env[key];
}

for (const p of CANDIDATES) {
  if (fs.existsSync(p)) {
    const result = loadDotenv({ path: p, override: true });
    expand(result);
    break;
  }
}

for (const key of PRESERVE_KEYS) {
  const val = preserved[key];
  if (val && val.trim() !== '' && !/\$\{.*\}/.test(val)) {
    process.env[key] = val;
  }
}

// Minimal validation for critical vars (non-fatal warnings only)
function warn(name: string) {
  const value = process.env[name];
  if (!value || /\$\{.*\}/.test(value)) {
    console.warn(`[env] WARN missing or unexpanded var: ${name}`);
  }
}

['RPC_POLYGON', 'EXECUTION_MODE'].forEach(warn);
