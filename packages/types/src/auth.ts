export const ACTOR_ROLES = ["customer", "driver", "admin"] as const;

export type ActorRole = (typeof ACTOR_ROLES)[number];

export type Actor =
  | { role: "customer"; identity: string }
  | { role: "driver"; identity: string; driverId: string }
  | { role: "admin"; identity: string };

export interface AuthAccessClaims {
  sub: string;
  role: ActorRole;
  driverId?: string;
  typ: "access";
}
