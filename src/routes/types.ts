import type { AuthService } from '../services/authService';
import type { TeamRegistrationService } from '../services/teamRegistrationService';
import type { UserService } from '../services/userService';

export interface AppServices {
  authService: AuthService;
  userService: UserService;
  teamRegistrationService: TeamRegistrationService;
}

export interface RouteOptions {
  services: AppServices;
}
