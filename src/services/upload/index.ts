export { UploadPipeline, readChunks, chunkCount } from './pipeline';
export type { UploadSource } from './pipeline';
export { FileUpload } from './session';
export type { UploadState } from './session';
