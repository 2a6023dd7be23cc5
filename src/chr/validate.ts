import fs from 'fs';
import path from 'path';
import { BYTES_PER_STRIP } from './constants';
import { fail, ok, type Result } from './errors';

// Returns the number of tile strips for a source of `size` bytes.
export function validateInputSize(size: number): Result<number> {
  const strips = Math.floor(size / BYTES_PER_STRIP);
  if (!Number.isInteger(size) || strips === 0 || size % BYTES_PER_STRIP !== 0) {
    return fail('InvalidInputSize', `invalid input file size: ${size} bytes (must be a positive multiple of ${BYTES_PER_STRIP})`);
  }
  return ok(strips);
}

// Returns the input file size in bytes.
export function checkInputFile(inputPath: string): Result<number> {
  const stat = statOrUndefined(inputPath);
  if (!stat || !stat.isFile()) {
    return fail('InputNotFound', `the input file does not exist: ${inputPath}`);
  }
  return ok(stat.size);
}

export function checkOutputPath(outputPath: string): Result<string> {
  if (fs.existsSync(outputPath)) {
    return fail('OutputAlreadyExists', `the output file already exists: ${outputPath}`);
  }
  const dir = path.dirname(outputPath);
  if (dir !== '' && dir !== '.' && !isDirectory(dir)) {
    return fail('OutputDirMissing', `the output directory does not exist: ${dir}`);
  }
  return ok(outputPath);
}

function isDirectory(p: string): boolean {
  const stat = statOrUndefined(p);
  return stat !== undefined && stat.isDirectory();
}

// ENOENT and ENOTDIR both mean "not there" for these checks.
function statOrUndefined(p: string) {
  try {
    return fs.statSync(p, { throwIfNoEntry: false });
  } catch (e) {
    if (e instanceof Error && 'code' in e && e.code === 'ENOTDIR') return undefined;
    throw e;
  }
}
