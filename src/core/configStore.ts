/**
 * @file configStore.ts
 * @description Persisted user configuration (active profile)
 */

import { Profile } from "../interfaces/task";
import { TaskError, TaskErrorCode } from "../errors/taskError";
import { Logger } from "../utils/logger";
import { AtomicJsonFile, errorText } from "./persistence";
import { DEFAULT_PROFILE_ID, findProfile, listProfiles } from "./profiles";

interface StoredConfig {
  activeProfileId: string;
}

/**
 * @class ConfigStore
 * @description Holds the active profile id, loaded once at startup and
 * written back through the same atomic replace as task snapshots
 */
export class ConfigStore {
  private activeProfileId = DEFAULT_PROFILE_ID;
  private readonly file: AtomicJsonFile;

  constructor(filePath: string) {
    this.file = new AtomicJsonFile(filePath);
  }

  /**
   * @method load
   * @description Reads config.json; unknown or malformed content keeps the default
   */
  public async load(): Promise<void> {
    const content = await this.file.read();
    if (typeof content !== "object" || content === null) {
      return;
    }
    const id: unknown = Reflect.get(content, "activeProfileId");
    if (typeof id === "string" && findProfile(id)) {
      this.activeProfileId = id;
      Logger.info(`Active profile: ${id}`);
    }
  }

  public listProfiles(): Profile[] {
    return listProfiles();
  }

  /**
   * @method getActiveProfile
   * @description The active profile, falling back to the default preset
   */
  public getActiveProfile(): Profile {
    const active = findProfile(this.activeProfileId);
    if (active) {
      return active;
    }
    const fallback = findProfile(DEFAULT_PROFILE_ID);
    if (!fallback) {
      throw new TaskError(
        TaskErrorCode.PROFILE_NOT_FOUND,
        "Default profile is missing"
      );
    }
    return fallback;
  }

  /**
   * @method setActiveProfile
   * @description Switches the preset used by subsequent runs
   * @throws {TaskError} PROFILE_NOT_FOUND for an unknown id
   */
  public async setActiveProfile(id: string): Promise<Profile> {
    const profile = findProfile(id);
    if (!profile) {
      throw new TaskError(
        TaskErrorCode.PROFILE_NOT_FOUND,
        `Profile ${id} not found`
      );
    }
    this.activeProfileId = profile.id;

    const stored: StoredConfig = { activeProfileId: profile.id };
    try {
      await this.file.write(stored);
    } catch (error) {
      Logger.warn(`Failed to save config: ${errorText(error)}`);
    }
    return profile;
  }
}
