// =============================================================================
// VAULTLINE — Drive
//
// The owner-facing operations. Each one writes the owner's copy first and
// only once the server has accepted it brings shares, links and the
// search index in line concurrently.
// Items are immutable values: every change returns a new object and the
// caller's copy keeps the old state if anything fails.
// =============================================================================

import type { ApiClient } from '../api/client';
import type { DirectoryLike, File, IncompleteFile, ListingResult, NonRootObject, RootDirectory } from '../types/filesystem';
import { TaskGroup } from './concurrency';
import type { KeyHierarchy } from './crypto/hierarchy';
import { DownloadPipeline, ReadOptions } from './download';
import { DirectoryLister } from './listing';
import { createLogger } from './log';
import { assertValidName, newIncompleteFile, NewFileOptions, serializeItemMetadata } from './metadata';
import type { Session } from './session';
import { SearchIndexer } from './search';
import { SharePropagator, SharePropagatorOptions } from './sharing';
import { UploadPipeline, UploadSource } from './upload';

const log = createLogger('Drive');

export class Drive {
  readonly uploads: UploadPipeline;
  readonly downloads: DownloadPipeline;
  readonly sharing: SharePropagator;
  readonly search: SearchIndexer;
  readonly lister: DirectoryLister;

  constructor(
    private readonly api: ApiClient,
    readonly hierarchy: KeyHierarchy,
    readonly root: RootDirectory,
    options: SharePropagatorOptions = {},
  ) {
    this.uploads = new UploadPipeline(api, hierarchy);
    this.downloads = new DownloadPipeline(api);
    this.lister = new DirectoryLister(api, hierarchy);
    this.sharing = new SharePropagator(api, hierarchy, this.lister, options);
    this.search = new SearchIndexer(api, hierarchy.hmacKey);
  }

  static fromSession(session: Session, options?: SharePropagatorOptions): Drive {
    return new Drive(session.api, session.hierarchy, session.root, options);
  }

  /** A local stub keyed for this account's file encryption version. */
  newFile(options: Omit<NewFileOptions, 'version'>): IncompleteFile {
    return newIncompleteFile({ ...options, version: this.hierarchy.fileEncryptionVersion });
  }

  async uploadFile(file: IncompleteFile, source: UploadSource, signal?: AbortSignal): Promise<File> {
    const uploaded = await this.uploads.uploadFile(file, source, signal);
    await this.afterPlacement(uploaded, signal);
    return uploaded;
  }

  readFile(file: File, options?: ReadOptions): Promise<Buffer> {
    return this.downloads.readAll(file, options);
  }

  downloadToPath(file: File, destination: string, signal?: AbortSignal): Promise<void> {
    return this.downloads.downloadToPath(file, destination, signal);
  }

  /** Re-seal the owner's metadata from `item` and push it to every share and link. */
  async updateMeta(item: NonRootObject, signal?: AbortSignal): Promise<void> {
    await this.writeOwnerMeta(item, signal);
    await this.sharing.updateSharedItem(item, signal);
  }

  async rename<T extends NonRootObject>(item: T, name: string, signal?: AbortSignal): Promise<T> {
    assertValidName(name);
    const renamed: T = { ...item, name };

    await this.writeOwnerMeta(renamed, signal);

    const group = new TaskGroup(Infinity, signal);
    group.go(s => this.sharing.updateSharedItem(renamed, s));
    group.go(s => this.search.updateSearchHashes(renamed, s));
    await group.wait();

    log.debug(`Renamed ${item.uuid}`);
    return renamed;
  }

  async move<T extends NonRootObject>(item: T, to: DirectoryLike, signal?: AbortSignal): Promise<T> {
    switch (item.type) {
      case 'file':
        await this.api.fileMove(item.uuid, to.uuid, signal);
        break;
      case 'directory':
        await this.api.dirMove(item.uuid, to.uuid, signal);
        break;
    }

    const moved: T = { ...item, parentUuid: to.uuid };
    await this.afterPlacement(moved, signal);

    log.debug(`Moved ${item.uuid} to ${to.uuid}`);
    return moved;
  }

  readDirectory(dir: DirectoryLike, signal?: AbortSignal): Promise<ListingResult> {
    return this.lister.readDirectory(dir, signal);
  }

  listRecursive(dir: DirectoryLike, signal?: AbortSignal): Promise<ListingResult> {
    return this.lister.listRecursive(dir, signal);
  }

  private async writeOwnerMeta(item: NonRootObject, signal?: AbortSignal): Promise<void> {
    const nameHashed = this.hierarchy.hashFileName(item.name);
    const metadata = this.hierarchy.encryptMeta(
      serializeItemMetadata(item, this.hierarchy.fileEncryptionVersion),
    );

    switch (item.type) {
      case 'file':
        await this.api.fileMetadata(
          {
            uuid: item.uuid,
            name: item.encryptionKey.toMasterKey().encryptMeta(item.name),
            nameHashed,
            metadata,
          },
          signal,
        );
        break;
      case 'directory':
        await this.api.dirMetadata({ uuid: item.uuid, nameHashed, metadata }, signal);
        break;
    }
  }

  /** Join the parent's shares and links and refresh search hashes. */
  private async afterPlacement(item: NonRootObject, signal?: AbortSignal): Promise<void> {
    const group = new TaskGroup(Infinity, signal);
    group.go(s => this.sharing.updateItemWithMaybeSharedParent(item, s));
    group.go(s => this.search.updateSearchHashes(item, s));
    await group.wait();
  }
}
