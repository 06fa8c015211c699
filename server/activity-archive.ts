import * as fs from "node:fs";
import * as path from "node:path";
import unzipper from "unzipper";
import { Readable } from "stream";

export interface ActivityFile {
  filename: string;
  read(): Promise<Buffer>;
}

export function bufferFile(filename: string, buffer: Buffer): ActivityFile {
  return { filename, read: async () => buffer };
}

export function isZipArchive(filename: string): boolean {
  return path.extname(filename).toLowerCase() === ".zip";
}

/** Entries of a zip upload whose names the extractor accepts; directories and other files are drained. */
export async function extractZipEntries(
  fileBuffer: Buffer,
  accepts: (filename: string) => boolean,
): Promise<ActivityFile[]> {
  const files: ActivityFile[] = [];
  const stream = Readable.from(fileBuffer);
  const zip = stream.pipe(unzipper.Parse({ forceStream: true }));

  for await (const entry of zip) {
    const typedEntry = entry as unzipper.Entry;
    const entryPath = typedEntry.path;
    const base = path.basename(entryPath);

    if (typedEntry.type === "File" && !base.startsWith(".") && accepts(base)) {
      const chunks: Buffer[] = [];
      for await (const chunk of typedEntry) {
        chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
      }
      files.push(bufferFile(base, Buffer.concat(chunks)));
    } else {
      typedEntry.autodrain();
    }
  }

  return files;
}

/** Activity files directly inside `folder`, sorted by name; read lazily. */
export async function listActivityFiles(
  folder: string,
  accepts: (filename: string) => boolean,
): Promise<ActivityFile[]> {
  const entries = await fs.promises.readdir(folder, { withFileTypes: true });
  return entries
    .filter((e) => e.isFile() && accepts(e.name))
    .map((e) => e.name)
    .sort()
    .map((name) => {
      const fullPath = path.join(folder, name);
      return { filename: name, read: () => fs.promises.readFile(fullPath) };
    });
}
