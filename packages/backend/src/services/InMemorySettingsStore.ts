import type { IndexStatus, KnowledgeBaseSettings } from "@ragdesk/shared";
import { applySettingsPatch, cloneSettings, type SettingsPatch, type SettingsStoreLike } from "./SettingsStore.js";

export class InMemorySettingsStore implements SettingsStoreLike {
  private current: KnowledgeBaseSettings;

  constructor(initial: KnowledgeBaseSettings) {
    this.current = cloneSettings(initial);
  }

  get(): KnowledgeBaseSettings {
    return cloneSettings(this.current);
  }

  update(patch: SettingsPatch): KnowledgeBaseSettings {
    this.current = applySettingsPatch(this.current, patch);
    return this.get();
  }

  setIndexStatus(status: IndexStatus): KnowledgeBaseSettings {
    this.current = {
      ...this.current,
      indexStatus: status,
      updatedAt: new Date().toISOString()
    };
    return this.get();
  }
}
