/**
 * @file profiles.ts
 * @description Built-in engine argument presets
 */

import { Profile } from "../interfaces/task";

export const DEFAULT_PROFILE_ID = "default";

const BUILTIN_PROFILES: readonly Profile[] = [
  { id: DEFAULT_PROFILE_ID, name: "Default", args: [] },
  { id: "audio-only", name: "Audio Only", args: ["-x", "--audio-format", "mp3"] },
  { id: "best-quality", name: "Best Quality", args: ["-f", "bv*+ba/b"] },
];

export function listProfiles(): Profile[] {
  return BUILTIN_PROFILES.map((profile) => ({
    ...profile,
    args: [...profile.args],
  }));
}

export function findProfile(id: string): Profile | null {
  return listProfiles().find((profile) => profile.id === id) ?? null;
}
