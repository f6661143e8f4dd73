export { DownloadPipeline, resolveRange } from './pipeline';
export type { ReadOptions } from './pipeline';
