import { mkdtempSync, mkdirSync, realpathSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { dirname, join } from "path";

/** Write `files` (root-relative path -> content) under a fresh temp directory */
export function createGoTree(files: Record<string, string>): string {
  const root = realpathSync(mkdtempSync(join(tmpdir(), "entrygraph-")));
  writeTreeFiles(root, files);
  return root;
}

export function writeTreeFiles(root: string, files: Record<string, string>): void {
  for (const [rel, content] of Object.entries(files)) {
    const file = join(root, rel);
    mkdirSync(dirname(file), { recursive: true });
    writeFileSync(file, content);
  }
}

export function removeTree(root: string): void {
  rmSync(root, { recursive: true, force: true });
}

export const GO_MOD = "module example.com/proj\n\ngo 1.21\n";

export function mainFile(imports: string[] = []): string {
  const block = imports.length ? `import (\n${imports.map((i) => `\t"${i}"`).join("\n")}\n)\n\n` : "";
  return `package main\n\n${block}func main() {}\n`;
}

export function libFile(pkg: string, imports: string[] = []): string {
  const block = imports.length ? `import (\n${imports.map((i) => `\t"${i}"`).join("\n")}\n)\n\n` : "";
  return `package ${pkg}\n\n${block}func Ping() {}\n`;
}
