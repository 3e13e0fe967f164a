import { AuthMissingError, ReauthNeededError } from '../../errors/mailbox.errors';
import type { GraphCollection, GraphMailFolder } from '../../types/mail.types';
import type { GraphClient } from './graph-client.service';

const INBOX = 'me/mailFolders/inbox/messages';

export const WELL_KNOWN_FOLDERS: ReadonlyMap<string, string> = new Map([
  ['inbox', INBOX],
  ['drafts', 'me/mailFolders/drafts/messages'],
  ['sent', 'me/mailFolders/sentItems/messages'],
  ['deleted', 'me/mailFolders/deletedItems/messages'],
  ['junk', 'me/mailFolders/junkemail/messages'],
  ['archive', 'me/mailFolders/archive/messages'],
]);

export class FolderResolver {
  constructor(private readonly graph: GraphClient) {}

  /**
   * Map a folder name to its messages endpoint.
   * Unknown names are looked up by displayName; anything not found falls back to the inbox.
   */
  async resolve(folderName?: string): Promise<string> {
    const name = folderName?.trim();
    if (!name) {
      return INBOX;
    }

    const wellKnown = WELL_KNOWN_FOLDERS.get(name.toLowerCase());
    if (wellKnown) {
      return wellKnown;
    }

    try {
      const response = await this.graph.get<GraphCollection<GraphMailFolder>>('me/mailFolders', {
        $filter: `displayName eq '${name.replace(/'/g, "''")}'`,
      });
      const folder = response.value?.[0];
      if (folder) {
        return `me/mailFolders/${folder.id}/messages`;
      }
    } catch (error) {
      if (error instanceof AuthMissingError || error instanceof ReauthNeededError) {
        throw error;
      }
      console.warn(`Folder lookup for '${name}' failed: ${error instanceof Error ? error.message : String(error)}`);
    }

    console.warn(`Folder '${name}' not found, using inbox`);
    return INBOX;
  }
}
