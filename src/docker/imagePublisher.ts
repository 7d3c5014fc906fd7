import execa from "execa";
import { logger } from "../utils/logger";
import { remoteCall } from "../utils/errors";
import { RegistryCredentials } from "../services/ecr";

/**
 * Builds the image in a directory and publishes it to a registry.
 */
export interface ImagePublisher {
  login(repositoryUri: string, credentials: RegistryCredentials): Promise<void>;
  build(image: string): Promise<void>;
  push(image: string): Promise<void>;
}

export function imageUri(repositoryUri: string, tag: string): string {
  return `${repositoryUri}:${tag}`;
}

/**
 * UTC timestamp tag, e.g. 20240307091502.
 */
export function generateTag(now: Date = new Date()): string {
  const pad = (value: number) => String(value).padStart(2, "0");

  return [
    now.getUTCFullYear(),
    pad(now.getUTCMonth() + 1),
    pad(now.getUTCDate()),
    pad(now.getUTCHours()),
    pad(now.getUTCMinutes()),
    pad(now.getUTCSeconds()),
  ].join("");
}

function registryHost(repositoryUri: string): string {
  return repositoryUri.split("/")[0];
}

/**
 * ImagePublisher backed by the local docker CLI.
 */
export class DockerCli implements ImagePublisher {
  constructor(private readonly contextDir: string = process.cwd()) {}

  async login(repositoryUri: string, credentials: RegistryCredentials): Promise<void> {
    const registry = registryHost(repositoryUri);
    logger.debug("Logging in to registry", { registry });

    await remoteCall("Could not log in to the image registry", () =>
      execa("docker", ["login", "--username", credentials.username, "--password-stdin", registry], {
        input: credentials.password,
      })
    );
  }

  async build(image: string): Promise<void> {
    logger.info(`Building Docker image ${image}`);

    await remoteCall("Could not build Docker image", () =>
      execa("docker", ["build", "-t", image, "."], { cwd: this.contextDir, stdio: "inherit" })
    );
  }

  async push(image: string): Promise<void> {
    logger.info(`📤 Pushing Docker image ${image}`);

    await remoteCall("Could not push Docker image", () =>
      execa("docker", ["push", image], { stdio: "inherit" })
    );
    logger.success("Docker image pushed");
  }
}
