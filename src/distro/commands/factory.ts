// Factory for distro-specific command adapters.
// Called by createContext() after detectHost(); the returned DistroCommands is
// stored on the ProvisionContext and used by every step.

import type { DistroFamily } from "../../types/distro.js";
import type { DistroCommands } from "./interface.js";
import { DebianCommands } from "./debian.js";
import { RHELCommands } from "./rhel.js";

export function createDistroCommands(family: DistroFamily): DistroCommands {
  switch (family) {
    case "debian": return new DebianCommands();
    case "rhel": return new RHELCommands();
  }
}
