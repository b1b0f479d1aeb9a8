#!/usr/bin/env -S npx tsx
import "dotenv/config";
import readline from "readline";
import { startApp } from "./lib/app";
import { errorMessage } from "./lib/errors";

const ask = (prompt: string) =>
  new Promise<string>((resolve) => {
    const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
    rl.on("SIGINT", () => {
      rl.close();
      resolve("");
    });
    rl.question(prompt, (answer) => {
      rl.close();
      resolve(answer);
    });
  });

// First Ctrl+C stops between searches or kills yt-dlp; a second one exits
const controller = new AbortController();
process.on("SIGINT", () => {
  if (controller.signal.aborted) process.exit(130);
  console.log("\nInterrupting...");
  controller.abort();
});

startApp({
  env: process.env,
  cwd: process.cwd(),
  ask,
  signal: controller.signal,
  onProgress: (done, total) => {
    process.stdout.write(`\rSearching YouTube: ${done}/${total}`);
  },
})
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error(errorMessage(err));
    process.exitCode = 1;
  });
