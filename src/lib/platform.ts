import { SetupError } from "./errors.js";
import type { SupportedOs } from "../types/index.js";

export function detectOs(platform: NodeJS.Platform = process.platform): SupportedOs {
  switch (platform) {
    case "linux":
      return "linux";
    case "darwin":
      return "mac";
    default:
      throw new SetupError(`Unsupported platform "${platform}": only linux and darwin are supported`);
  }
}
