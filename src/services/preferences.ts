import type { UserPreferences, UserPreferencesDraft } from "../types/contracts.js";
import { decodeJSON, userPreferencesSchema } from "../types/schemas.js";
import { NotFoundError, StoreError } from "../utils/errors.js";
import { createChildLogger } from "../utils/logger.js";
import type { SQLiteDatabase } from "./database.js";

export const DEFAULT_PREFERENCES: UserPreferencesDraft = {
  dietaryRestrictions: [],
  cuisinePreferences: [],
  skillLevel: "intermediate",
  mealTypePreferences: [],
};

const MAX_READY_TIME: Record<UserPreferences["skillLevel"], number | undefined> = {
  beginner: 30,
  intermediate: 60,
  advanced: undefined,
};

const log = createChildLogger({ service: "preferences" });

type PreferencesRow = {
  preferences_json: string;
};

/**
 * Food preferences collected during onboarding. A user has finished
 * onboarding once preferences are stored for them.
 */
export class UserPreferenceService {
  constructor(
    private readonly db: SQLiteDatabase,
    private readonly now: () => Date = () => new Date()
  ) {}

  get(userId: string): UserPreferences | null {
    let row: PreferencesRow | undefined;
    try {
      row = this.db.prepare("SELECT preferences_json FROM user_preferences WHERE user_id = ?").get(userId) as
        | PreferencesRow
        | undefined;
    } catch (error) {
      throw new StoreError("Failed to read preferences", error);
    }
    if (!row) {
      return null;
    }

    const preferences = decodeJSON(row.preferences_json, userPreferencesSchema);
    if (!preferences) {
      log.warn({ msg: "Ignoring unreadable preferences", userId });
    }
    return preferences;
  }

  /** Replaces all preferences, keeping the original creation time. */
  save(userId: string, draft: UserPreferencesDraft): UserPreferences {
    const existing = this.get(userId);
    const timestamp = this.now().toISOString();
    const preferences: UserPreferences = {
      ...normalize(draft),
      createdAt: existing?.createdAt ?? timestamp,
      ...(existing ? { updatedAt: timestamp } : {}),
    };
    this.write(userId, preferences);
    return preferences;
  }

  update(userId: string, changes: Partial<UserPreferencesDraft>): UserPreferences {
    const existing = this.get(userId);
    if (!existing) {
      throw new NotFoundError(`No preferences saved for ${userId}`);
    }

    const preferences: UserPreferences = {
      ...normalize({ ...existing, ...changes }),
      createdAt: existing.createdAt,
      updatedAt: this.now().toISOString(),
    };
    this.write(userId, preferences);
    return preferences;
  }

  hasCompletedOnboarding(userId: string): boolean {
    return this.get(userId) !== null;
  }

  /** Stores the defaults unless the user already has preferences. */
  markOnboardingComplete(userId: string): UserPreferences {
    return this.get(userId) ?? this.save(userId, DEFAULT_PREFERENCES);
  }

  clear(userId: string): boolean {
    try {
      return this.db.prepare("DELETE FROM user_preferences WHERE user_id = ?").run(userId).changes > 0;
    } catch (error) {
      throw new StoreError("Failed to clear preferences", error);
    }
  }

  private write(userId: string, preferences: UserPreferences): void {
    try {
      this.db
        .prepare(
          `INSERT INTO user_preferences (user_id, preferences_json) VALUES (?, ?)
           ON CONFLICT(user_id) DO UPDATE SET preferences_json = excluded.preferences_json`
        )
        .run(userId, JSON.stringify(preferences));
    } catch (error) {
      throw new StoreError("Failed to save preferences", error);
    }
  }
}

/** Longest recipe, in minutes, that suits the skill level; none for advanced cooks. */
export function maxReadyTime(preferences: Pick<UserPreferences, "skillLevel">): number | undefined {
  return MAX_READY_TIME[preferences.skillLevel];
}

function normalize(draft: UserPreferencesDraft): UserPreferencesDraft {
  return {
    dietaryRestrictions: unique(draft.dietaryRestrictions),
    cuisinePreferences: unique(draft.cuisinePreferences),
    skillLevel: draft.skillLevel,
    mealTypePreferences: unique(draft.mealTypePreferences),
  };
}

function unique<T>(values: readonly T[]): T[] {
  return Array.from(new Set(values));
}
