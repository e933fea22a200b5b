import * as os from "os";

/**
 * Name of the machine the display is attached to
 */
export function getHostname(): string {
  return os.hostname();
}
