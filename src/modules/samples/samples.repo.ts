import type { SqliteDatabase } from "../../shared/db/database.js";

import type { Sample } from "./samples.types.js";

interface SampleRow {
  id: string;
  platform_product_id: string;
  platform_campaign_id: string | null;
  platform_creator_username: string | null;
  platform_creator_display_name: string | null;
  status: string | null;
  creation_time: string;
  last_modification_time: string;
}

const mapRowToSample = (row: SampleRow): Sample => ({
  id: row.id,
  platformProductId: row.platform_product_id,
  platformCampaignId: row.platform_campaign_id,
  platformCreatorUsername: row.platform_creator_username,
  platformCreatorDisplayName: row.platform_creator_display_name,
  status: row.status,
  creationTime: row.creation_time,
  lastModificationTime: row.last_modification_time
});

export class SamplesRepository {
  public constructor(private readonly db: SqliteDatabase) {}

  public create(sample: Sample): void {
    this.db
      .prepare(
        `
        INSERT INTO samples (
          id, platform_product_id, platform_campaign_id, platform_creator_username,
          platform_creator_display_name, status, creation_time, last_modification_time
        )
        VALUES (?, ?, ?, ?, ?, ?, ?, ?)
      `
      )
      .run(
        sample.id,
        sample.platformProductId,
        sample.platformCampaignId,
        sample.platformCreatorUsername,
        sample.platformCreatorDisplayName,
        sample.status,
        sample.creationTime,
        sample.lastModificationTime
      );
  }

  public findByIdAndCreatorUsername(sampleId: string, username: string): Sample | null {
    const row = this.db
      .prepare(
        `
        SELECT id, platform_product_id, platform_campaign_id, platform_creator_username,
               platform_creator_display_name, status, creation_time, last_modification_time
        FROM samples
        WHERE id = ?
          AND platform_creator_username = ?
      `
      )
      .get(sampleId, username) as SampleRow | undefined;

    if (!row) {
      return null;
    }

    return mapRowToSample(row);
  }
}
