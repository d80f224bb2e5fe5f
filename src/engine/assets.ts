import type {CommandRunner, OnLogLine} from './command-runner.js'

/**
 * Downloads a single file to a fixed location.
 */
export type AssetFetcher = {
  /** Fetches `url` and leaves the (decompressed) file at `destination`. */
  fetch(url: string, destination: string): Promise<void>;
}

/**
 * wget for the transfer, bunzip2 for `.bz2` payloads.
 */
export class WgetAssetFetcher implements AssetFetcher {
  constructor(
    private readonly runner: CommandRunner,
    private readonly onLogLine?: OnLogLine
  ) {}

  async fetch(url: string, destination: string): Promise<void> {
    if (!isBzip2(url)) {
      await this.download(url, destination)
      return
    }

    const archive = `${destination}.bz2`
    await this.download(url, archive)
    await this.runner.run({command: 'bunzip2', args: ['-f', archive]}, this.onLogLine)
  }

  private async download(url: string, destination: string): Promise<void> {
    await this.runner.run({command: 'wget', args: ['-q', '-O', destination, url]}, this.onLogLine)
  }
}

export function isBzip2(url: string): boolean {
  return new URL(url).pathname.endsWith('.bz2')
}
