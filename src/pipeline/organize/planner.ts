import path from 'node:path';
import type { AttachmentRecord, StoragePlan } from '../../types.js';
import { formatDay } from '../../utils/dates.js';

export interface NameProbe {
  exists(folderPath: string, fileName: string): Promise<boolean>;
}

export function sanitizeName(input: string): string {
  const cleaned = input
    .normalize('NFKC')
    .replace(/[\u0000-\u001f\u007f]/g, '')
    .replace(/[<>:"/\\|?*]+/g, '_')
    .replace(/\s+/g, '_')
    .replace(/_+/g, '_')
    .replace(/^[._]+|[._]+$/g, '');
  return cleaned.slice(0, 150) || 'attachment';
}

function splitExtension(fileName: string): { stem: string; ext: string } {
  const ext = path.extname(fileName);
  if (!ext || ext === fileName) {
    return { stem: fileName, ext: '.pdf' };
  }
  return { stem: fileName.slice(0, -ext.length), ext: ext.toLowerCase() };
}

export function groupFolder(root: string, groupKey: string): string {
  return path.posix.join(root, sanitizeName(groupKey));
}

export function baseFileName(attachment: Pick<AttachmentRecord, 'filename' | 'receivedTimestamp'>): string {
  const { stem, ext } = splitExtension(attachment.filename);
  return `${formatDay(attachment.receivedTimestamp)}-${sanitizeName(stem)}${ext}`;
}

/**
 * Destination for each attachment: `<root>/<group>/<YYYY-MM-DD>-<name>`.
 * A name taken in storage or already handed out in this run gets `-1`, `-2`...
 */
export class OrganizationPlanner {
  private readonly reserved = new Set<string>();

  constructor(
    private readonly root: string,
    private readonly probe: NameProbe,
  ) {}

  async plan(attachment: AttachmentRecord, groupKey: string = attachment.groupKey): Promise<StoragePlan> {
    const folderPath = groupFolder(this.root, groupKey);
    const { stem, ext } = splitExtension(baseFileName(attachment));

    for (let suffix = 0; ; suffix += 1) {
      const fileName = suffix === 0 ? `${stem}${ext}` : `${stem}-${suffix}${ext}`;
      const key = path.posix.join(folderPath, fileName);
      if (this.reserved.has(key)) {
        continue;
      }
      // Reserve before the await so a concurrent unit cannot take the same name.
      this.reserved.add(key);
      if (!(await this.probe.exists(folderPath, fileName))) {
        return { folderPath, fileName };
      }
    }
  }
}
