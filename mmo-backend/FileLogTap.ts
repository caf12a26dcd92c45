// mmo-backend/FileLogTap.ts

import fs from "fs";
import util from "util";

import { stripAnsi } from "../worldcore/utils/colors";

type ConsoleMethod = (...args: unknown[]) => void;

function serializeArg(arg: unknown): string {
  if (typeof arg === "string") {
    return stripAnsi(arg);
  }
  if (arg instanceof Error) {
    const msg = arg.stack ?? arg.message;
    return stripAnsi(msg);
  }
  try {
    return stripAnsi(JSON.stringify(arg));
  } catch {
    // circular or BigInt
    return stripAnsi(util.inspect(arg));
  }
}

export function formatLine(args: unknown[]): string {
  return args.map(serializeArg).join(" ");
}

function wrapMethod(
  level: string,
  original: ConsoleMethod,
  writer: (level: string, args: unknown[]) => void,
): ConsoleMethod {
  return (...args: unknown[]): void => {
    writer(level, args);
    original.apply(console, args);
  };
}

/**
 * Mirror console output, ANSI-stripped, into the file named by SK_FILELOG.
 * Returns false when the tap is not enabled.
 */
export function installFileLogTap(env: NodeJS.ProcessEnv = process.env): boolean {
  const filePath = env.SK_FILELOG;
  if (!filePath) return false;

  const stream = fs.createWriteStream(filePath, { flags: "a" });
  const { log, info, warn, error } = console;

  // A broken log file must not take the server down; report once and stop writing.
  let failed = false;
  stream.on("error", (err) => {
    if (failed) return;
    failed = true;
    error.call(console, `[FileLogTap] disabled: ${err.message}`);
  });

  const writeLine = (level: string, args: unknown[]): void => {
    if (failed) return;
    const line = `[${new Date().toISOString()}] [${level}] ${formatLine(args)}\n`;
    stream.write(line);
  };

  console.log = wrapMethod("log", log, writeLine);
  console.info = wrapMethod("info", info, writeLine);
  console.warn = wrapMethod("warn", warn, writeLine);
  console.error = wrapMethod("error", error, writeLine);

  return true;
}
