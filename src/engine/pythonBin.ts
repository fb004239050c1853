import fs from "node:fs";
import path from "node:path";
import type { Config } from "../config";

/** PYTHON_BIN when set, otherwise the repo-local ./.venv interpreter. */
export function resolvePythonBin(cfg: Pick<Config, "pythonBin">, cwd = process.cwd()): string {
  if (cfg.pythonBin) {
    const looksLikePath = cfg.pythonBin.includes("/") || cfg.pythonBin.includes("\\");
    if (looksLikePath && !fs.existsSync(cfg.pythonBin)) {
      throw new Error(`PYTHON_BIN points to a missing file: ${cfg.pythonBin}`);
    }
    return cfg.pythonBin;
  }

  const venvPython =
    process.platform === "win32"
      ? path.join(cwd, ".venv", "Scripts", "python.exe")
      : path.join(cwd, ".venv", "bin", "python");

  if (fs.existsSync(venvPython)) return venvPython;

  throw new Error(`Python .venv not found. Expected ${venvPython}. Create it or set PYTHON_BIN.`);
}
