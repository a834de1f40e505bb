import { describeError } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import type { Syncer } from "../types.js";
import { runCommand, type CommandRunner } from "../utils/process.js";

const RCLONE_TIMEOUT_MS = 5 * 60 * 1000;

export interface RcloneSyncerOptions {
  rcloneCmd: string;
  runner?: CommandRunner;
  logger?: Logger;
}

/** Copies one file to an rclone remote (`rclone copyto <src> <dest>`). */
export class RcloneSyncer implements Syncer {
  private readonly runner: CommandRunner;
  private readonly log: Logger;

  constructor(private readonly options: RcloneSyncerOptions) {
    this.runner = options.runner ?? runCommand;
    this.log = (options.logger ?? silentLogger).child({ module: "sync" });
  }

  async sync(localPath: string, remoteDestination: string): Promise<boolean> {
    this.log.info({ destination: remoteDestination }, "Uploading to rclone");
    try {
      await this.runner(this.options.rcloneCmd, ["copyto", localPath, remoteDestination], {
        timeoutMs: RCLONE_TIMEOUT_MS,
      });
    } catch (err) {
      this.log.error({ destination: remoteDestination, error: describeError(err) }, "Rclone upload failed");
      return false;
    }
    this.log.info({ destination: remoteDestination }, "Rclone upload succeeded");
    return true;
  }
}
