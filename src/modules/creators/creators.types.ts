export interface Creator {
  id: string;
  platform: string;
  platformCreatorId: string;
  platformCreatorUsername: string;
  platformCreatorDisplayName: string;
  email: string | null;
  whatsapp: string | null;
  creationTime: string;
  lastModificationTime: string;
}
