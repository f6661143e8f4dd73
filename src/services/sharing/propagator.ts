// =============================================================================
// VAULTLINE — Share Propagator
//
// An item's metadata exists in several sealed copies: the owner's (under
// the key hierarchy), one per recipient (RSA to their public key) and one
// per public link (under the link key). Whenever the owner's copy changes
// the others are rewritten here, and whenever an item lands under a shared
// or linked directory it is added to every share and link of that parent.
//
// Share and link records are never cached; every call asks the server.
// Every fan-out runs through a TaskGroup capped at MAX_SMALL_CALLERS and
// stops at its first failure. Sends are upserts, so re-running after a
// partial failure converges.
// =============================================================================

import type { KeyObject } from 'crypto';
import { v4 as uuidv4 } from 'uuid';
import type { ApiClient } from '../../api/client';
import { MAX_SMALL_CALLERS } from '../../config';
import { PropagationPartialFailureError, UnsupportedObjectVariantError } from '../../errors';
import type { LinkedEntry, SharedUser } from '../../types/api';
import type { MetaCrypter } from '../../types/crypto';
import type { Directory, FileSystemObject, NonRootObject, ShareTarget } from '../../types/filesystem';
import { TaskGroup } from '../concurrency';
import { v2Hash } from '../crypto/encryption';
import type { KeyHierarchy } from '../crypto/hierarchy';
import { generateRandomBytes, generateRandomString } from '../crypto/random';
import { publicEncrypt, publicKeyFromString } from '../crypto/rsa';
import type { DirectoryLister } from '../listing';
import { createLogger } from '../log';
import { asNonRoot, itemTypeTag, serializeItemMetadata } from '../metadata';

const log = createLogger('Share');

/** Parent of the top item of a new share. */
const SHARE_ROOT_PARENT = 'none';
/** Parent of the top directory of a new link. */
const LINK_ROOT_PARENT = 'base';
const LINK_KEY_LENGTH = 32;
const LINK_SALT_BYTES = 128;
const NO_PASSWORD = 'empty';
const NEVER_EXPIRES = 'never';

export interface SharePropagatorOptions {
  /** In-flight request ceiling per fan-out. Defaults to MAX_SMALL_CALLERS. */
  maxConcurrency?: number;
}

/** A link record with its key already unwrapped. */
interface OpenLink {
  linkUuid: string;
  wrappedKey: string;
  crypter: MetaCrypter;
}

function openRecipient(user: SharedUser): { user: SharedUser; publicKey: KeyObject } {
  return { user, publicKey: publicKeyFromString(user.publicKey) };
}

export class SharePropagator {
  private readonly maxConcurrency: number;

  constructor(
    private readonly api: ApiClient,
    private readonly hierarchy: KeyHierarchy,
    private readonly lister: DirectoryLister,
    options: SharePropagatorOptions = {},
  ) {
    this.maxConcurrency = options.maxConcurrency ?? MAX_SMALL_CALLERS;
  }

  // ── Queries ──────────────────────────────────────────────────────────

  async isItemShared(item: FileSystemObject, signal?: AbortSignal): Promise<boolean> {
    const target = asNonRoot(item, 'check sharing of');
    const shared = await this.api.itemShared(target.uuid, signal);
    return shared.sharing && shared.users.length > 0;
  }

  async isItemLinked(item: FileSystemObject, signal?: AbortSignal): Promise<boolean> {
    const target = asNonRoot(item, 'check links of');
    const linked = await this.api.itemLinked(target.uuid, signal);
    return linked.link && linked.links.length > 0;
  }

  // ── Propagation ──────────────────────────────────────────────────────

  /**
   * Rewrite every recipient's and every link's copy of the item's
   * metadata from the current owner copy. Creates nothing.
   */
  async updateSharedItem(item: FileSystemObject, signal?: AbortSignal): Promise<void> {
    const target = asNonRoot(item, 'propagate metadata of');
    const operation = `updateSharedItem(${target.uuid})`;

    const { users, links } = await this.lookupRecipients(
      operation,
      signal,
      s => this.api.itemShared(target.uuid, s),
      s => this.api.itemLinked(target.uuid, s),
    );
    if (users.length === 0 && links.length === 0) return;

    const metadata = serializeItemMetadata(target, this.hierarchy.fileEncryptionVersion);
    const recipients = users.map(user => openRecipient(user));
    const openLinks = links.map(link => this.openLink(link));

    await this.fanOut(operation, signal, group => {
      for (const { user, publicKey } of recipients) {
        group.go(s =>
          this.api.itemSharedRename(
            { uuid: target.uuid, receiverId: user.id, metadata: publicEncrypt(publicKey, metadata) },
            s,
          ),
        );
      }
      for (const link of openLinks) {
        group.go(s =>
          this.api.itemLinkedRename(
            { uuid: target.uuid, linkUuid: link.linkUuid, metadata: link.crypter.encryptMeta(metadata) },
            s,
          ),
        );
      }
    });

    log.debug(`Updated ${users.length} shares and ${links.length} links of ${target.uuid}`);
  }

  /**
   * Add a newly created or moved item, with its subtree, to every share
   * and link of its parent. No-op when the parent is neither.
   */
  async updateItemWithMaybeSharedParent(item: FileSystemObject, signal?: AbortSignal): Promise<void> {
    const target = asNonRoot(item, 'propagate into the parent of');
    const operation = `updateItemWithMaybeSharedParent(${target.uuid})`;

    const { users, links } = await this.lookupRecipients(
      operation,
      signal,
      s => this.api.itemShared(target.parentUuid, s),
      s => this.api.dirLinked(target.parentUuid, s),
    );
    if (users.length === 0 && links.length === 0) return;

    const targets = await this.collectTargets(target, target.parentUuid, signal);
    const recipients = users.map(user => openRecipient(user));
    const openLinks = links.map(link => this.openLink(link));

    await this.fanOut(operation, signal, group => {
      for (const { user, publicKey } of recipients) {
        for (const t of targets) {
          group.go(s => this.shareTarget(t, user.email, publicKey, s));
        }
      }
      for (const link of openLinks) {
        for (const t of targets) {
          group.go(s => this.linkTarget(t, link, s));
        }
      }
    });

    log.debug(
      `Propagated ${targets.length} items of ${target.uuid} to ${users.length} shares and ${links.length} links`,
    );
  }

  /** Share an item (and for a directory, its whole subtree) with one user. */
  async shareItemToUser(item: FileSystemObject, email: string, signal?: AbortSignal): Promise<void> {
    const target = asNonRoot(item, 'share');
    const operation = `shareItemToUser(${target.uuid})`;

    const publicKey = publicKeyFromString(await this.api.userPublicKey(email, signal));
    const targets = await this.collectTargets(target, SHARE_ROOT_PARENT, signal);

    await this.fanOut(operation, signal, group => {
      for (const t of targets) {
        group.go(s => this.shareTarget(t, email, publicKey, s));
      }
    });

    log.info(`Shared ${target.uuid} (${targets.length} items)`);
  }

  /** Enable a public link for an item. Resolves with the new link UUID. */
  async publicLinkItem(item: FileSystemObject, signal?: AbortSignal): Promise<string> {
    switch (item.type) {
      case 'file':
        return this.linkFile(item.uuid, signal);
      case 'directory':
        return this.linkDirectory(item, signal);
      case 'root':
        throw new UnsupportedObjectVariantError(item.type, 'create a public link for');
    }
  }

  // ── Internals ────────────────────────────────────────────────────────

  private async linkFile(fileUuid: string, signal?: AbortSignal): Promise<string> {
    const linkUuid = uuidv4();
    await this.api.fileLinkEdit(
      {
        uuid: linkUuid,
        fileUuid,
        expiration: NEVER_EXPIRES,
        password: NO_PASSWORD,
        passwordHashed: v2Hash(NO_PASSWORD),
        downloadBtn: false,
        type: 'enable',
        salt: generateRandomBytes(LINK_SALT_BYTES).toString('hex'),
      },
      signal,
    );
    log.info(`Linked file ${fileUuid}`);
    return linkUuid;
  }

  private async linkDirectory(dir: Directory, signal?: AbortSignal): Promise<string> {
    const linkKey = generateRandomString(LINK_KEY_LENGTH);
    const link: OpenLink = {
      linkUuid: uuidv4(),
      wrappedKey: this.hierarchy.encryptMeta(linkKey),
      crypter: this.hierarchy.metaCrypterForLinkKey(linkKey),
    };

    // The root target (parent "base") comes first; the server accepts the adds in any order
    const targets = await this.collectTargets(dir, LINK_ROOT_PARENT, signal);

    await this.fanOut(`publicLinkItem(${dir.uuid})`, signal, group => {
      for (const t of targets) {
        group.go(s => this.linkTarget(t, link, s));
      }
    });

    log.info(`Linked directory ${dir.uuid} (${targets.length} items)`);
    return link.linkUuid;
  }

  private shareTarget(target: ShareTarget, email: string, publicKey: KeyObject, signal: AbortSignal): Promise<void> {
    return this.api.itemShare(
      {
        uuid: target.uuid,
        parent: target.parentUuid,
        email,
        type: target.type,
        metadata: publicEncrypt(publicKey, target.metadata),
      },
      signal,
    );
  }

  private linkTarget(target: ShareTarget, link: OpenLink, signal?: AbortSignal): Promise<void> {
    return this.api.dirLinkAdd(
      {
        uuid: target.uuid,
        parent: target.parentUuid,
        linkUuid: link.linkUuid,
        type: target.type,
        metadata: link.crypter.encryptMeta(target.metadata),
        key: link.wrappedKey,
        expiration: NEVER_EXPIRES,
      },
      signal,
    );
  }

  private openLink(entry: LinkedEntry): OpenLink {
    const linkKey = this.hierarchy.decryptMeta(entry.linkKey);
    return {
      linkUuid: entry.linkUuid,
      wrappedKey: entry.linkKey,
      crypter: this.hierarchy.metaCrypterForLinkKey(linkKey),
    };
  }

  private toTarget(item: NonRootObject, parentUuid: string): ShareTarget {
    return {
      uuid: item.uuid,
      parentUuid,
      type: itemTypeTag(item),
      metadata: serializeItemMetadata(item, this.hierarchy.fileEncryptionVersion),
    };
  }

  /** The item first (under `rootParent`), then every descendant under its own parent. */
  private async collectTargets(
    item: NonRootObject,
    rootParent: string,
    signal?: AbortSignal,
  ): Promise<ShareTarget[]> {
    const root = this.toTarget(item, rootParent);
    switch (item.type) {
      case 'file':
        return [root];
      case 'directory': {
        const listing = await this.lister.listRecursive(item, signal);
        return [
          root,
          ...listing.directories.map(dir => this.toTarget(dir, dir.parentUuid)),
          ...listing.files.map(file => this.toTarget(file, file.parentUuid)),
        ];
      }
    }
  }

  private async lookupRecipients(
    operation: string,
    signal: AbortSignal | undefined,
    fetchShared: (signal: AbortSignal) => Promise<{ sharing: boolean; users: SharedUser[] }>,
    fetchLinked: (signal: AbortSignal) => Promise<{ link: boolean; links: LinkedEntry[] }>,
  ): Promise<{ users: SharedUser[]; links: LinkedEntry[] }> {
    const found: { users: SharedUser[]; links: LinkedEntry[] } = { users: [], links: [] };
    await this.fanOut(operation, signal, group => {
      group.go(async s => {
        const shared = await fetchShared(s);
        if (shared.sharing) found.users = shared.users;
      });
      group.go(async s => {
        const linked = await fetchLinked(s);
        if (linked.link) found.links = linked.links;
      });
    });
    return found;
  }

  private async fanOut(
    operation: string,
    signal: AbortSignal | undefined,
    submit: (group: TaskGroup) => void,
  ): Promise<void> {
    const group = new TaskGroup(this.maxConcurrency, signal);
    submit(group);
    try {
      await group.wait();
    } catch (err: unknown) {
      log.warn(`${operation} stopped at first failure`);
      throw new PropagationPartialFailureError(operation, err);
    }
  }
}
