import { join } from 'path';
import { promises as fs } from 'fs';
import { PROCESS_TIMEOUTS } from '../../constants/index.js';
import { DeploymentError, getErrorMessage } from '../../utils/errors.js';
import { ensureDir } from '../../utils/fs.js';
import { hashString } from '../../utils/hash-utils.js';
import { logger } from '../../utils/logger.js';

export type FetchFunction = (url: string, init: { signal: AbortSignal }) => Promise<Response>;

export interface BinaryFetcherOptions {
  downloadsDir: string;
  fetchImpl?: FetchFunction;
  timeoutMs?: number;
}

/**
 * Downloads remote binaries into the cache's downloads directory so they can
 * be compared with and copied to their destination like local files.
 */
export class BinaryFetcher {
  private readonly downloadsDir: string;
  private readonly fetchImpl: FetchFunction;
  private readonly timeoutMs: number;

  constructor(options: BinaryFetcherOptions) {
    this.downloadsDir = options.downloadsDir;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.timeoutMs = options.timeoutMs ?? PROCESS_TIMEOUTS.DOWNLOAD_MS;
  }

  async download(name: string, url: string): Promise<string> {
    await ensureDir(this.downloadsDir);
    const target = join(this.downloadsDir, `${(await hashString(url)).slice(0, 16)}-${process.pid}`);

    logger.debug(`Downloading ${name} from ${url}`);
    let response: Response;
    try {
      response = await this.fetchImpl(url, { signal: AbortSignal.timeout(this.timeoutMs) });
    } catch (error) {
      throw new DeploymentError(name, `download from ${url} failed: ${getErrorMessage(error)}`, { url, error });
    }

    if (!response.ok) {
      throw new DeploymentError(name, `download from ${url} failed: HTTP ${response.status}`, { url, status: response.status });
    }

    const body = Buffer.from(await response.arrayBuffer());
    await fs.writeFile(target, body);
    logger.debug(`Downloaded ${body.length} bytes for ${name}`, { target });
    return target;
  }

  async discard(path: string): Promise<void> {
    await fs.rm(path, { force: true });
  }
}
