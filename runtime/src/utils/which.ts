import { access, constants } from 'node:fs/promises';
import { delimiter, isAbsolute, join } from 'node:path';

async function isExecutable(file: string): Promise<boolean> {
  return access(file, constants.X_OK).then(
    () => true,
    () => false,
  );
}

/**
 * Report whether `bin` resolves to an executable file, either as a path or
 * through the directories of `pathEnv`.
 */
export async function hasExecutable(bin: string, pathEnv: string = process.env.PATH ?? ''): Promise<boolean> {
  if (isAbsolute(bin) || bin.includes('/')) return isExecutable(bin);
  for (const dir of pathEnv.split(delimiter)) {
    if (dir !== '' && (await isExecutable(join(dir, bin)))) return true;
  }
  return false;
}
