import type { AppConfig } from "../config/env";
import { AuthService } from "../auth/service";
import type { IStorage } from "../storage/types";
import { UserService } from "./userService";
import { InvitationService } from "./invitation";
import { GameService, WorkersClient, type MovesClient } from "./game";

export interface AppServices {
  storage: IStorage;
  auth: AuthService;
  users: UserService;
  invitations: InvitationService;
  games: GameService;
}

/** Wire every service over one store. The workers client can be swapped in tests. */
export function createServices(
  config: AppConfig,
  storage: IStorage,
  movesClient: MovesClient = new WorkersClient(config.workers)
): AppServices {
  const auth = new AuthService(config.auth);
  return {
    storage,
    auth,
    users: new UserService(storage, auth),
    invitations: new InvitationService(storage),
    games: new GameService(storage, movesClient),
  };
}
