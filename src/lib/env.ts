import { config } from 'dotenv';
import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

const __dirname = fileURLToPath(new URL('.', import.meta.url));
const projectRoot = resolve(__dirname, '../../');

// Project env, then local overrides
config({ path: resolve(projectRoot, '.env'), override: false });
config({ path: resolve(projectRoot, '.env.local'), override: true });

// Working directory env (optional)
config({ path: resolve(process.cwd(), '.env'), override: false });
