import { existsSync, readFileSync, writeFileSync } from "fs";

/** Set `name=value` in dotenv text, replacing an existing line for `name`. */
export function upsertEnvLine(envText: string, name: string, value: string): string {
  const line = `${name}=${value}`;
  const re = new RegExp(`^${name}=.*$`, "m");
  if (re.test(envText)) return envText.replace(re, () => line);
  return envText + (envText === "" || envText.endsWith("\n") ? "" : "\n") + `${line}\n`;
}

export function saveEnvVar(envPath: string, name: string, value: string) {
  const envText = existsSync(envPath) ? readFileSync(envPath, "utf8") : "";
  writeFileSync(envPath, upsertEnvLine(envText, name, value), "utf8");
}
