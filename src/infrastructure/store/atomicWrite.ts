import { promises as fs } from "fs";
import path from "path";

/**
 * Writes `contents` next to `target` and renames it over the target, so readers
 * see either the previous file or the new one.
 */
export const writeFileAtomic = async (target: string, contents: string): Promise<void> => {
  await fs.mkdir(path.dirname(target), { recursive: true });
  const tmpPath = `${target}.tmp`;

  const handle = await fs.open(tmpPath, "w");
  try {
    await handle.writeFile(contents, "utf8");
    await handle.sync();
  } finally {
    await handle.close();
  }

  try {
    await fs.rename(tmpPath, target);
  } catch (err) {
    await fs.rm(tmpPath, { force: true });
    throw err;
  }
};

/** `undefined` when the file does not exist. */
export const readFileIfExists = async (target: string): Promise<string | undefined> => {
  try {
    return await fs.readFile(target, "utf8");
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") return undefined;
    throw err;
  }
};

// fs errors raised inside a Jest sandbox are not `instanceof Error` there.
export const isErrnoException = (err: unknown): err is NodeJS.ErrnoException =>
  typeof err === "object" && err !== null && "code" in err && typeof err.code === "string";
