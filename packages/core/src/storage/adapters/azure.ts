/**
 * Azure Blob Storage adapter.
 * Listing: `listBlobsFlat` paged with `byPage`, tags included.
 * Tier change: Set Blob Tier on the exact version seen during listing.
 * Auth: the Azure CLI session, scoped to the run's tenant.
 */

import { AzureCliCredential } from "@azure/identity";
import { BlobServiceClient, type BlobItem } from "@azure/storage-blob";
import type { ObjectStoreProvider, RawObjectMetadata } from "./interface.js";

export interface AzureBlobProviderOptions {
  serviceClient: BlobServiceClient;
  /** Listing page size. Default: 5000 (the service maximum) */
  pageSize?: number;
}

export interface BlobServiceClientOptions {
  endpoint: string;
  tenantId: string;
}

export function blobEndpointFor(accountName: string): string {
  return `https://${accountName}.blob.core.windows.net`;
}

export function createBlobServiceClient(
  options: BlobServiceClientOptions,
): BlobServiceClient {
  const credential = new AzureCliCredential({ tenantId: options.tenantId });
  return new BlobServiceClient(options.endpoint, credential);
}

export function toRawMetadata(item: BlobItem): RawObjectMetadata {
  const { properties } = item;
  return {
    name: item.name,
    versionId: item.versionId,
    accessTier: properties.accessTier,
    lastModified: properties.lastModified,
    lastAccessedOn: properties.lastAccessedOn,
    contentLength: properties.contentLength,
    archiveStatus: properties.archiveStatus,
    rehydratePriority: properties.rehydratePriority,
    etag: properties.etag,
    tags: item.tags,
  };
}

export function createAzureBlobProvider(
  options: AzureBlobProviderOptions,
): ObjectStoreProvider {
  const { serviceClient } = options;
  const pageSize = options.pageSize ?? 5_000;

  return {
    async *listObjects(container, filter, signal) {
      const containerClient = serviceClient.getContainerClient(container);
      const pages = containerClient
        .listBlobsFlat({
          includeTags: true,
          includeMetadata: true,
          abortSignal: signal,
        })
        .byPage({ maxPageSize: pageSize });

      // Flat listings have no server-side tier predicate; apply it per page.
      for await (const page of pages) {
        for (const item of page.segment.blobItems) {
          if (filter?.tier && item.properties.accessTier !== filter.tier) {
            continue;
          }
          yield toRawMetadata(item);
        }
      }
    },

    async setTier(container, objectName, targetTier, setOptions) {
      const blobClient = serviceClient
        .getContainerClient(container)
        .getBlobClient(objectName);
      const target = setOptions?.versionId
        ? blobClient.withVersion(setOptions.versionId)
        : blobClient;

      await target.setAccessTier(targetTier, {
        rehydratePriority: setOptions?.rehydratePriority,
      });
    },
  };
}
