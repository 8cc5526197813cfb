import fs from 'fs';
import path from 'path';
import { InputFileError } from './errors';

export interface WorkspacePaths {
  root: string;
  inputs: string;
  artifacts: string;
  preferences: string;
  tradePlans: string;
  screener: string;
  researchDir: string;
  sizingDir: string;
}

export function workspacePaths(root: string): WorkspacePaths {
  const inputs = path.join(root, 'inputs');
  const artifacts = path.join(root, 'artifacts');
  return {
    root,
    inputs,
    artifacts,
    preferences: path.join(inputs, 'preferences.json'),
    tradePlans: path.join(artifacts, 'signals', 'trade_plans.json'),
    screener: path.join(artifacts, 'signals', 'screener.json'),
    researchDir: path.join(artifacts, 'research'),
    sizingDir: path.join(artifacts, 'sizing'),
  };
}

export function readJson(file: string): unknown {
  let text: string;
  try {
    text = fs.readFileSync(file, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      throw new InputFileError(file, `Missing file: ${file}`);
    }
    throw err;
  }
  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new InputFileError(file, `Invalid JSON in ${file}: ${detail}`);
  }
}

/** Paths that do not exist or are zero bytes. */
export function missingOrEmpty(files: string[]): string[] {
  return files.filter((f) => !fs.existsSync(f) || fs.statSync(f).size === 0);
}

/** Writes through a sibling temp file so readers never see a partial file. */
export function writeFileAtomic(file: string, content: string): void {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  const tmp = `${file}.${process.pid}.tmp`;
  fs.writeFileSync(tmp, content, 'utf-8');
  fs.renameSync(tmp, file);
}
