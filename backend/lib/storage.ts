import fs from "node:fs";
import path from "node:path";
import { loadServiceConfig } from "./config.js";

export function storageRoot() {
  // Read dynamically to allow tests to change env between runs
  const configured = loadServiceConfig().storagePath;
  if (configured) {
    return path.resolve(configured);
  }

  // Fall back to <project root>/storage, found by walking up to package.json
  let projectRoot = process.cwd();
  let searchPath = projectRoot;
  while (searchPath !== path.dirname(searchPath)) {
    if (fs.existsSync(path.join(searchPath, "package.json"))) {
      projectRoot = searchPath;
      break;
    }
    searchPath = path.dirname(searchPath);
  }
  return path.resolve(projectRoot, "storage");
}

export function key(...parts: string[]) {
  return parts.join("/").replace(/\\/g, "/");
}

export function taskKey(env: string, taskId: string, ...rest: string[]) {
  return key(env, "tasks", taskId, ...rest);
}

export function outputKey(env: string, taskId: string) {
  return taskKey(env, taskId, "output", `${taskId}.mp4`);
}

export function workDirKey(env: string, taskId: string) {
  return taskKey(env, taskId, "work");
}

export function pathFor(k: string) {
  return path.join(storageRoot(), k);
}

export function ensureDirForFile(filePath: string) {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
}

export function writeFileAtKey(k: string, data: Buffer | string) {
  const p = pathFor(k);
  ensureDirForFile(p);
  fs.writeFileSync(p, data);
  return p;
}

export function readFileAtKey(k: string) {
  return fs.readFileSync(pathFor(k));
}

export function existsAtKey(k: string) {
  return fs.existsSync(pathFor(k));
}

export function removeAtKey(k: string) {
  fs.rmSync(pathFor(k), { recursive: true, force: true });
}
