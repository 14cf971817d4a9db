import { readFileSync } from "fs";
import { dirname, resolve } from "path";
import { fileURLToPath } from "url";
import { z } from "zod";

export const getConfigDir = () => {
  const currentDir = dirname(fileURLToPath(import.meta.url));
  return resolve(currentDir, "..", "config");
};

export const readJsonFile = <T>(filePath: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T => {
  const contents = readFileSync(filePath, "utf-8");
  try {
    return schema.parse(JSON.parse(contents));
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issues = error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
      throw new Error(`Invalid data in ${filePath}:\n${issues.join("\n")}`);
    }
    throw error;
  }
};
