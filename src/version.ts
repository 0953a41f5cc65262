import { readFileSync } from "fs";

// Read the installer version from package.json next to the sources
export const VERSION = (() => {
  try {
    const pkg: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
    if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
      return pkg.version;
    }
    return "0.0.0";
  } catch {
    return "0.0.0";
  }
})();
