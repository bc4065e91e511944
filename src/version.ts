import { readFileSync } from "fs";
import { join, dirname } from "path";
import { fileURLToPath } from "url";

// Get package version
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJsonPath = join(__dirname, '..', 'package.json');
const packageJson: { version?: unknown } = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));

export const VERSION = typeof packageJson.version === 'string' ? packageJson.version : '0.0.0';
