import { mkdirSync, readFileSync, renameSync, writeFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { z } from "zod";
import type { IndexStatus, KnowledgeBaseSettings } from "@ragdesk/shared";
import type { AppConfig } from "../config.js";
import { InvalidParameterError } from "../errors.js";
import { DEFAULT_SUPPORTED_EXTENSIONS, normalizeExtension } from "../parsers/formats.js";
import { logger } from "../utils/logger.js";

export const INDEX_STATUSES = ["not_created", "creating", "created", "error"] as const;

const settingsFieldsSchema = z.object({
  embeddingModel: z.string().trim().min(1),
  generationModel: z.string().trim().min(1),
  ollamaBaseUrl: z.string().url(),
  collectionName: z
    .string()
    .trim()
    .regex(/^[A-Za-z0-9_-]{3,63}$/, "must be 3-63 letters, digits, '-' or '_'"),
  collectionPath: z.string().trim().min(1),
  folders: z.array(z.string().trim().min(1)),
  supportedExtensions: z
    .array(
      z
        .string()
        .transform(normalizeExtension)
        .refine((extension) => DEFAULT_SUPPORTED_EXTENSIONS.includes(extension), "unsupported extension")
    )
    .min(1)
});

export const settingsPatchSchema = settingsFieldsSchema.partial().strict();
export type SettingsPatch = z.input<typeof settingsPatchSchema>;

const storedSettingsSchema = settingsFieldsSchema.extend({
  indexStatus: z.enum(INDEX_STATUSES).default("not_created"),
  updatedAt: z.string().default(() => new Date().toISOString())
});

export interface SettingsStoreLike {
  get(): KnowledgeBaseSettings;
  update(patch: SettingsPatch): KnowledgeBaseSettings;
  setIndexStatus(status: IndexStatus): KnowledgeBaseSettings;
}

export function defaultSettings(config: AppConfig): KnowledgeBaseSettings {
  return {
    embeddingModel: config.EMBEDDING_MODEL,
    generationModel: config.GENERATION_MODEL,
    ollamaBaseUrl: config.OLLAMA_BASE_URL,
    collectionName: config.COLLECTION_NAME,
    collectionPath: config.COLLECTION_PATH,
    folders: [],
    supportedExtensions: [...DEFAULT_SUPPORTED_EXTENSIONS],
    indexStatus: "not_created",
    updatedAt: new Date().toISOString()
  };
}

/** Validates a partial update and merges it over `current`. */
export function applySettingsPatch(current: KnowledgeBaseSettings, patch: SettingsPatch): KnowledgeBaseSettings {
  const parsed = settingsPatchSchema.safeParse(patch);
  if (!parsed.success) {
    throw new InvalidParameterError("Invalid settings", { issues: parsed.error.issues });
  }

  return {
    ...current,
    ...parsed.data,
    supportedExtensions: parsed.data.supportedExtensions
      ? [...new Set(parsed.data.supportedExtensions)]
      : current.supportedExtensions,
    updatedAt: new Date().toISOString()
  };
}

export interface JsonSettingsStoreOptions {
  filePath?: string;
  defaults: KnowledgeBaseSettings;
}

/**
 * Knowledge-base settings in one JSON file. A missing or invalid file
 * falls back to the defaults; writes go through a temp file and a rename.
 */
export class JsonSettingsStore implements SettingsStoreLike {
  private readonly filePath: string;
  private current: KnowledgeBaseSettings;

  constructor(options: JsonSettingsStoreOptions) {
    this.filePath = resolve(options.filePath ?? "data/settings.json");
    this.current = this.load(options.defaults);
  }

  get(): KnowledgeBaseSettings {
    return cloneSettings(this.current);
  }

  update(patch: SettingsPatch): KnowledgeBaseSettings {
    this.current = applySettingsPatch(this.current, patch);
    this.persist();
    return this.get();
  }

  setIndexStatus(status: IndexStatus): KnowledgeBaseSettings {
    this.current = {
      ...this.current,
      indexStatus: status,
      updatedAt: new Date().toISOString()
    };
    this.persist();
    return this.get();
  }

  private load(defaults: KnowledgeBaseSettings): KnowledgeBaseSettings {
    let raw: string;
    try {
      raw = readFileSync(this.filePath, "utf8");
    } catch {
      return cloneSettings(defaults);
    }

    try {
      const parsed = storedSettingsSchema.partial().safeParse(JSON.parse(raw));
      if (parsed.success) {
        return { ...cloneSettings(defaults), ...parsed.data };
      }
      logger.warn({ filePath: this.filePath, issues: parsed.error.issues }, "Settings file is invalid, using defaults");
    } catch (error) {
      logger.warn({ err: error, filePath: this.filePath }, "Settings file is not valid JSON, using defaults");
    }
    return cloneSettings(defaults);
  }

  private persist(): void {
    mkdirSync(dirname(this.filePath), { recursive: true });
    const tempPath = `${this.filePath}.tmp`;
    writeFileSync(tempPath, `${JSON.stringify(this.current, null, 2)}\n`, "utf8");
    renameSync(tempPath, this.filePath);
  }
}

export function cloneSettings(settings: KnowledgeBaseSettings): KnowledgeBaseSettings {
  return {
    ...settings,
    folders: [...settings.folders],
    supportedExtensions: [...settings.supportedExtensions]
  };
}
