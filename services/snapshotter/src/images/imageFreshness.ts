import { execFile } from "node:child_process";
import { promisify } from "node:util";
import type { Logger } from "../telemetry/logger.js";
import type { ImageInspector } from "../types/interfaces.js";

const execFileAsync = promisify(execFile);

export type CommandRunner = (cmd: string, args: string[], options: { cwd: string }) => Promise<string>;

const runCommand: CommandRunner = async (cmd, args, options) => {
  const { stdout } = await execFileAsync(cmd, args, { cwd: options.cwd, maxBuffer: 16 * 1024 * 1024 });
  return stdout;
};

/** `nginx` and `nginx:latest` name the same image; `docker images` always prints the tag. */
export function normalizeImageRef(ref: string): string {
  if (ref.includes("@")) return ref;
  const lastSegment = ref.slice(ref.lastIndexOf("/") + 1);
  return lastSegment.includes(":") ? ref : `${ref}:latest`;
}

function lines(output: string): string[] {
  return output
    .split("\n")
    .map((line) => line.trim())
    .filter(Boolean);
}

/**
 * Compares the image each running compose container was started from with the local image
 * currently carrying the same repository:tag. A different id means a newer image was pulled
 * and the deploy will change something.
 */
export class DockerImageInspector implements ImageInspector {
  private readonly run: CommandRunner;
  private readonly logger: Logger;

  constructor(private readonly options: { cwd: string; logger: Logger; run?: CommandRunner }) {
    this.run = options.run ?? runCommand;
    this.logger = options.logger.child({ component: "images" });
  }

  async hasNewerImages(): Promise<boolean> {
    const containerIds = lines(await this.docker(["compose", "ps", "--status=running", "--quiet"]));
    if (containerIds.length === 0) {
      this.logger.info("No running compose containers found");
      return false;
    }

    const localImages = this.parseImageList(
      await this.docker(["images", "--no-trunc", "--format", "{{.Repository}}:{{.Tag}} {{.ID}}"])
    );

    for (const containerId of containerIds) {
      const imageId = (await this.docker(["inspect", "--format", "{{.Image}}", containerId])).trim();
      const imageRef = normalizeImageRef((await this.docker(["inspect", "--format", "{{.Config.Image}}", containerId])).trim());
      const localId = localImages.get(imageRef);
      if (localId && localId !== imageId) {
        this.logger.info(`Newer image detected for ${imageRef}`);
        return true;
      }
    }
    return false;
  }

  private parseImageList(output: string): Map<string, string> {
    const images = new Map<string, string>();
    for (const line of lines(output)) {
      const separator = line.lastIndexOf(" ");
      if (separator <= 0) continue;
      const ref = line.slice(0, separator);
      if (ref.endsWith(":<none>")) continue;
      images.set(ref, line.slice(separator + 1));
    }
    return images;
  }

  private docker(args: string[]): Promise<string> {
    return this.run("docker", args, { cwd: this.options.cwd });
  }
}
