/**
 * IPFS content store
 *
 * Publishes audited segment data so verifiers can fetch it by CID.
 */

import { create, type IPFSHTTPClient } from "ipfs-http-client";
import type { ContentStore } from "../../claims/types";
import { logger } from "../../utils/logger";

type IpfsFactory = (apiUrl: string) => IPFSHTTPClient;

const defaultFactory: IpfsFactory = (apiUrl) => create({ url: apiUrl });

export class IpfsContentStore implements ContentStore {
  private client: IPFSHTTPClient | null = null;

  constructor(
    private readonly apiUrl: string,
    private readonly factory: IpfsFactory = defaultFactory
  ) {}

  async publish(data: Uint8Array): Promise<string> {
    const { cid } = await this.getClient().add(data, { pin: true });
    const address = cid.toString();
    logger.debug({ cid: address, bytes: data.byteLength }, "Published segment data to IPFS");
    return address;
  }

  async ping(): Promise<void> {
    await this.getClient().version();
  }

  private getClient(): IPFSHTTPClient {
    if (!this.client) {
      this.client = this.factory(this.apiUrl);
      logger.info({ url: this.apiUrl }, "IPFS client initialized");
    }
    return this.client;
  }
}
