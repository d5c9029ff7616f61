import fs from "fs/promises";
import type { Dirent, Stats } from "fs";
import path from "path";
import { RESULT_EXTENSIONS, RESULTS_DIR_NAME, RESULTS_DIR_SUFFIX } from "@/lib/constants";
import { SelectionError } from "@/lib/errors";
import { outputFileName, outputPathFor, resolveOutputLayout, type OutputLayout } from "@/lib/file-utils";
import { isSupportedImage } from "@/lib/image-utils";
import type { ImageSelection, ProcessedImage } from "@/types/selection";

export interface ScanOptions {
  outputSuffix: string;
  signal?: AbortSignal;
}

export function emptySelection(): ImageSelection {
  return { images: [], alreadyProcessed: [], skippedDirectories: 0, skippedFiles: 0 };
}

export function isResultDirectory(dirPath: string): boolean {
  const name = path.basename(dirPath).toLowerCase();
  return name === RESULTS_DIR_NAME || name.endsWith(RESULTS_DIR_SUFFIX);
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** A file one of our runs wrote, e.g. `a_out.jpg` or `a_out-2.png`. */
export function isResultFile(fileName: string, outputSuffix: string): boolean {
  const stem = path.basename(fileName, path.extname(fileName));
  return new RegExp(`${escapeRegExp(outputSuffix)}(-\\d+)?$`, "i").test(stem);
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch {
    return false;
  }
}

/**
 * Looks for a result at every default location a run could have written it to
 * (see `resolveOutputLayout`), plus beside the image itself.
 */
export async function findExistingResult(
  imagePath: string,
  outputSuffix: string,
  root?: string
): Promise<string | null> {
  const dir = path.dirname(imagePath);
  const stem = path.basename(imagePath, path.extname(imagePath));

  const layouts: OutputLayout[] = [
    ...(root ? [resolveOutputLayout([imagePath], root)] : []),
    { outputDir: dir, root: dir },
    resolveOutputLayout([imagePath]),
    resolveOutputLayout([imagePath], dir),
  ];
  const candidateDirs = new Set(layouts.map((layout) => path.dirname(outputPathFor(imagePath, layout, outputSuffix))));
  const names = new Set([
    outputFileName(imagePath, outputSuffix),
    ...RESULT_EXTENSIONS.map((ext) => `${stem}${outputSuffix}${ext}`),
  ]);

  for (const candidateDir of candidateDirs) {
    for (const name of names) {
      const candidate = path.join(candidateDir, name);
      if (await fileExists(candidate)) return candidate;
    }
  }
  return null;
}

/**
 * Recursively lists the images under `folderPath` that still need processing.
 * Result folders and result files from earlier runs are skipped; images that
 * already have a result are reported separately.
 */
export async function scanFolder(folderPath: string, options: ScanOptions): Promise<ImageSelection> {
  const trimmed = folderPath.trim();
  if (!trimmed) return emptySelection();

  const root = path.resolve(trimmed);
  let rootStat: Stats;
  try {
    rootStat = await fs.stat(root);
  } catch {
    throw new SelectionError(`Folder not found: ${root}`);
  }
  if (!rootStat.isDirectory()) {
    throw new SelectionError(`Not a folder: ${root}`);
  }
  if (isResultDirectory(root)) {
    throw new SelectionError(`${root} is a results folder; pick the folder with the original images`);
  }

  const selection: ImageSelection = { ...emptySelection(), root };
  const found: string[] = [];

  async function walk(dir: string): Promise<void> {
    if (options.signal?.aborted) return;
    let entries: Dirent[];
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch (error) {
      console.warn(`[image-selector] Cannot read ${dir}:`, error);
      return;
    }

    for (const entry of entries) {
      if (options.signal?.aborted) return;
      const fullPath = path.join(dir, entry.name);

      if (entry.isDirectory()) {
        if (isResultDirectory(fullPath)) {
          selection.skippedDirectories++;
          continue;
        }
        await walk(fullPath);
        continue;
      }

      if (!entry.isFile() || !isSupportedImage(entry.name)) continue;
      if (isResultFile(entry.name, options.outputSuffix)) {
        selection.skippedFiles++;
        continue;
      }
      found.push(fullPath);
    }
  }

  await walk(root);

  const alreadyProcessed: ProcessedImage[] = [];
  for (const imagePath of found) {
    const existing = await findExistingResult(imagePath, options.outputSuffix, root);
    if (existing) {
      alreadyProcessed.push({ sourcePath: imagePath, outputPath: existing });
    } else {
      selection.images.push(imagePath);
    }
  }

  selection.images.sort();
  selection.alreadyProcessed = alreadyProcessed.sort((a, b) => a.sourcePath.localeCompare(b.sourcePath));
  return selection;
}

/** Validates explicitly chosen image files, keeping the given order. */
export async function selectFiles(filePaths: string[]): Promise<ImageSelection> {
  const selection = emptySelection();
  const seen = new Set<string>();

  for (const raw of filePaths) {
    const trimmed = raw.trim();
    if (!trimmed) continue;
    const filePath = path.resolve(trimmed);
    if (seen.has(filePath)) continue;

    if (!isSupportedImage(filePath)) {
      throw new SelectionError(`Unsupported image type: ${path.basename(filePath)}`);
    }
    if (!(await fileExists(filePath))) {
      throw new SelectionError(`Image not found: ${filePath}`);
    }
    seen.add(filePath);
    selection.images.push(filePath);
  }
  return selection;
}
