import fs from "fs/promises";
import path from "path";
import { ConfigurationError, type Letter } from "./types";

function isLetterFile(file: string): boolean {
  return /\.txt$/i.test(file);
}

async function readLetter(filePath: string): Promise<Letter> {
  const text = await fs.readFile(filePath, "utf8");
  return { patientId: path.parse(filePath).name, text };
}

/**
 * A single letter file, or every `.txt` file of a directory sorted by name.
 * The patient id is the file name without its extension.
 */
export async function loadLetters(inputPath: string): Promise<Letter[]> {
  const resolved = path.resolve(inputPath);
  const stat = await fs.stat(resolved).catch(() => undefined);
  if (!stat) {
    throw new ConfigurationError(`Input path not found: ${resolved}`, { path: resolved });
  }

  if (stat.isFile()) {
    return [await readLetter(resolved)];
  }

  const files = (await fs.readdir(resolved)).filter(isLetterFile).sort();
  if (!files.length) {
    throw new ConfigurationError(`No letter files (*.txt) found in ${resolved}`, { path: resolved });
  }

  const letters: Letter[] = [];
  for (const file of files) {
    letters.push(await readLetter(path.join(resolved, file)));
  }
  return letters;
}
