import { ACTOR_ROLES, Actor, ActorRole } from "@dropline/types";
import { Injectable, UnauthorizedException } from "@nestjs/common";
import * as jwt from "jsonwebtoken";
import { getOrderServiceEnv } from "../../config/env";

function isActorRole(value: unknown): value is ActorRole {
  return typeof value === "string" && ACTOR_ROLES.some((role) => role === value);
}

/**
 * Turns a bearer access token into an `Actor`. Tokens are issued elsewhere;
 * this side only verifies the signature and the claim shape.
 */
@Injectable()
export class ActorResolverService {
  private readonly jwtSecret = getOrderServiceEnv().jwtSecret;

  resolveAuthorizationHeader(authorization?: string | string[]): Actor {
    return this.resolveToken(this.extractBearer(authorization));
  }

  resolveToken(token: string): Actor {
    let decoded: string | jwt.JwtPayload;
    try {
      decoded = jwt.verify(token, this.jwtSecret);
    } catch {
      throw new UnauthorizedException("Invalid access token");
    }
    if (typeof decoded === "string") throw new UnauthorizedException("Invalid access token");
    if (decoded.typ !== "access") throw new UnauthorizedException("Token type mismatch");

    const { sub, role, driverId } = decoded;
    if (typeof sub !== "string" || sub.length === 0 || !isActorRole(role)) {
      throw new UnauthorizedException("Malformed access token claims");
    }

    switch (role) {
      case "driver":
        if (typeof driverId !== "string" || driverId.length === 0) {
          throw new UnauthorizedException("Driver token is missing driverId");
        }
        return { role, identity: sub, driverId };
      case "customer":
        return { role, identity: sub };
      case "admin":
        return { role, identity: sub };
    }
  }

  private extractBearer(authorization?: string | string[]): string {
    const header = Array.isArray(authorization) ? authorization[0] : authorization;
    if (!header || !header.startsWith("Bearer ")) {
      throw new UnauthorizedException("Missing bearer token");
    }
    return header.slice("Bearer ".length).trim();
  }
}
