import fs from "node:fs/promises";
import path from "node:path";
import crypto from "node:crypto";
import { z } from "zod";
import { SettingsPersistError } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";

export type PreferenceValue = string | number | boolean | null;
export type CallerPreferences = Record<string, PreferenceValue>;

/** File operations the store needs; swapped out in tests to simulate crashes. */
export interface SettingsFileSystem {
  /** Resolves to null when the file does not exist. */
  readFile(filePath: string): Promise<string | null>;
  /** Creates `filePath` exclusively and flushes it to disk. */
  writeFile(filePath: string, data: string): Promise<void>;
  rename(from: string, to: string): Promise<void>;
  unlink(filePath: string): Promise<void>;
  mkdir(dirPath: string): Promise<void>;
}

export const nodeSettingsFileSystem: SettingsFileSystem = {
  async readFile(filePath) {
    try {
      return await fs.readFile(filePath, "utf-8");
    } catch (err) {
      if (isErrnoException(err) && err.code === "ENOENT") return null;
      throw err;
    }
  },
  async writeFile(filePath, data) {
    const handle = await fs.open(filePath, "wx", 0o600);
    try {
      await handle.writeFile(data, "utf-8");
      await handle.sync();
    } finally {
      await handle.close();
    }
  },
  rename: (from, to) => fs.rename(from, to),
  unlink: (filePath) => fs.unlink(filePath),
  async mkdir(dirPath) {
    await fs.mkdir(dirPath, { recursive: true });
  },
};

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

const PreferenceValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);
const SettingsFileSchema = z.record(
  z.string().regex(/^-?\d+$/, "caller ids must be integers"),
  z.record(z.string(), PreferenceValueSchema)
);

/** Serializes async critical sections in call order. */
class Mutex {
  private tail: Promise<void> = Promise.resolve();

  runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    const run = this.tail.then(fn);
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}

export interface SettingsStoreOptions {
  fileSystem?: SettingsFileSystem;
  logger?: Logger;
}

/**
 * Per-caller key/value preferences mirrored to one JSON file.
 *
 * Every write rewrites the whole file through a temp file and a rename in the
 * same directory, so the file on disk is always either the previous or the
 * new complete document. All reads and writes go through one mutex.
 */
export class SettingsStore {
  private settings = new Map<number, CallerPreferences>();
  private readonly mutex = new Mutex();
  private readonly fileSystem: SettingsFileSystem;
  private readonly log: Logger;

  constructor(
    readonly filePath: string,
    options: SettingsStoreOptions = {}
  ) {
    this.fileSystem = options.fileSystem ?? nodeSettingsFileSystem;
    this.log = (options.logger ?? silentLogger).child({ module: "settings" });
  }

  get backupPath(): string {
    return `${this.filePath}.bak`;
  }

  init(): Promise<void> {
    return this.mutex.runExclusive(async () => {
      await this.fileSystem.mkdir(path.dirname(this.filePath));
      const raw = await this.fileSystem.readFile(this.filePath);
      if (raw === null) {
        this.settings = new Map();
        this.log.info({ file: this.filePath }, "No existing settings file, starting fresh");
        return;
      }

      const parsed = parseSettingsFile(raw);
      if (parsed.ok) {
        this.settings = parsed.settings;
        this.log.info({ file: this.filePath, callers: this.settings.size }, "Loaded settings");
        return;
      }

      this.settings = new Map();
      try {
        await this.fileSystem.rename(this.filePath, this.backupPath);
        this.log.warn(
          { file: this.filePath, backup: this.backupPath, reason: parsed.reason },
          "Settings file corrupted, moved aside"
        );
      } catch (err) {
        this.log.error({ err, file: this.filePath }, "Failed to back up corrupted settings file");
      }
    });
  }

  get(callerId: number, key: string, defaultValue: PreferenceValue): Promise<PreferenceValue> {
    return this.mutex.runExclusive(() => {
      const prefs = this.settings.get(callerId);
      return prefs && Object.hasOwn(prefs, key) ? prefs[key] : defaultValue;
    });
  }

  /** Copy of one caller's preferences; mutating it does not touch the store. */
  getAll(callerId: number): Promise<CallerPreferences> {
    return this.mutex.runExclusive(() => ({ ...this.settings.get(callerId) }));
  }

  snapshot(): Promise<Record<number, CallerPreferences>> {
    return this.mutex.runExclusive(() => {
      const copy: Record<number, CallerPreferences> = {};
      for (const [callerId, prefs] of this.settings) {
        copy[callerId] = { ...prefs };
      }
      return copy;
    });
  }

  set(callerId: number, key: string, value: PreferenceValue): Promise<void> {
    return this.mutex.runExclusive(async () => {
      const previous = this.settings.get(callerId);
      this.settings.set(callerId, { ...previous, [key]: value });
      try {
        await this.persist();
      } catch (err) {
        if (previous) {
          this.settings.set(callerId, previous);
        } else {
          this.settings.delete(callerId);
        }
        throw new SettingsPersistError(`Failed to save settings to ${this.filePath}`, {
          cause: err,
        });
      }
    });
  }

  private async persist(): Promise<void> {
    const dir = path.dirname(this.filePath);
    const tmpPath = path.join(
      dir,
      `.${path.basename(this.filePath)}.${crypto.randomBytes(6).toString("hex")}.tmp`
    );
    const document: Record<string, CallerPreferences> = {};
    for (const [callerId, prefs] of this.settings) {
      document[String(callerId)] = prefs;
    }

    try {
      await this.fileSystem.writeFile(tmpPath, `${JSON.stringify(document, null, 2)}\n`);
      await this.fileSystem.rename(tmpPath, this.filePath);
    } catch (err) {
      await this.fileSystem.unlink(tmpPath).catch((unlinkErr: unknown) => {
        this.log.warn({ err: unlinkErr, tmpPath }, "Could not remove temporary settings file");
      });
      throw err;
    }
  }
}

type ParseResult =
  | { ok: true; settings: Map<number, CallerPreferences> }
  | { ok: false; reason: string };

function parseSettingsFile(raw: string): ParseResult {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    return { ok: false, reason: err instanceof Error ? err.message : String(err) };
  }
  const result = SettingsFileSchema.safeParse(json);
  if (!result.success) {
    return { ok: false, reason: result.error.issues.map((i) => i.message).join("; ") };
  }
  const settings = new Map<number, CallerPreferences>();
  for (const [callerId, prefs] of Object.entries(result.data)) {
    settings.set(Number(callerId), { ...prefs });
  }
  return { ok: true, settings };
}
