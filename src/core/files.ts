import * as NodeFs from "node:fs/promises";
import * as NodePath from "node:path";

const isNotFound = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

/**
 * Reads a UTF-8 file, resolving to undefined when it does not exist.
 */
export const readFileIfExists = async (path: string): Promise<string | undefined> => {
  try {
    return await NodeFs.readFile(path, "utf-8");
  } catch (error) {
    if (isNotFound(error)) {
      return undefined;
    }
    throw error;
  }
};

export const writeJsonFile = async (path: string, value: unknown): Promise<void> => {
  await NodeFs.mkdir(NodePath.dirname(path), { recursive: true });
  await NodeFs.writeFile(path, `${JSON.stringify(value, null, 2)}\n`, "utf-8");
};
