import type { SqliteDatabase } from "../../shared/db/database.js";

import type { Creator } from "./creators.types.js";

interface CreatorRow {
  id: string;
  platform: string;
  platform_creator_id: string;
  platform_creator_username: string;
  platform_creator_display_name: string;
  email: string | null;
  whatsapp: string | null;
  creation_time: string;
  last_modification_time: string;
}

const mapRowToCreator = (row: CreatorRow): Creator => ({
  id: row.id,
  platform: row.platform,
  platformCreatorId: row.platform_creator_id,
  platformCreatorUsername: row.platform_creator_username,
  platformCreatorDisplayName: row.platform_creator_display_name,
  email: row.email,
  whatsapp: row.whatsapp,
  creationTime: row.creation_time,
  lastModificationTime: row.last_modification_time
});

export class CreatorsRepository {
  public constructor(private readonly db: SqliteDatabase) {}

  public create(creator: Creator): void {
    this.db
      .prepare(
        `
        INSERT INTO creators (
          id, platform, platform_creator_id, platform_creator_username, platform_creator_display_name,
          email, whatsapp, creation_time, last_modification_time
        )
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
      `
      )
      .run(
        creator.id,
        creator.platform,
        creator.platformCreatorId,
        creator.platformCreatorUsername,
        creator.platformCreatorDisplayName,
        creator.email,
        creator.whatsapp,
        creator.creationTime,
        creator.lastModificationTime
      );
  }

  public findByUsername(username: string): Creator | null {
    const row = this.db
      .prepare(
        `
        SELECT id, platform, platform_creator_id, platform_creator_username, platform_creator_display_name,
               email, whatsapp, creation_time, last_modification_time
        FROM creators
        WHERE platform_creator_username = ?
        ORDER BY creation_time ASC
        LIMIT 1
      `
      )
      .get(username) as CreatorRow | undefined;

    if (!row) {
      return null;
    }

    return mapRowToCreator(row);
  }
}
