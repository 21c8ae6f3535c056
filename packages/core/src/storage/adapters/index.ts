export type {
  ListObjectsFilter,
  ObjectStoreProvider,
  RawObjectMetadata,
  SetTierOptions,
} from "./interface.js";
export {
  blobEndpointFor,
  createAzureBlobProvider,
  createBlobServiceClient,
  toRawMetadata,
  type AzureBlobProviderOptions,
  type BlobServiceClientOptions,
} from "./azure.js";
