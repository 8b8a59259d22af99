import type { AttachmentQuery, AttachmentRecord, TabularLayout } from '../types.js';

export interface MailCollaborator {
  listAttachments(query: AttachmentQuery): Promise<AttachmentRecord[]>;
}

/**
 * `store` throws FolderNotFound when the folder is missing (the caller creates
 * it and retries) and CollaboratorFatal on quota or permission problems.
 */
export interface StorageCollaborator {
  store(bytes: Uint8Array, folderPath: string, fileName: string): Promise<string>;
  ensureFolder(folderPath: string): Promise<void>;
  exists(folderPath: string, fileName: string): Promise<boolean>;
  read(destinationPath: string): Promise<Uint8Array>;
}

export interface ReportCollaborator {
  appendSheet(groupKey: string, layout: TabularLayout): Promise<void>;
}
