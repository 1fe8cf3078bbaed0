export interface Sample {
  id: string;
  platformProductId: string;
  platformCampaignId: string | null;
  platformCreatorUsername: string | null;
  platformCreatorDisplayName: string | null;
  status: string | null;
  creationTime: string;
  lastModificationTime: string;
}
