import { Actor } from "@dropline/types";
import {
  CanActivate,
  ExecutionContext,
  Injectable,
  UnauthorizedException,
  createParamDecorator,
} from "@nestjs/common";
import { ActorResolverService } from "./actor-resolver.service";

type ActorRequest = {
  headers: Record<string, string | string[] | undefined>;
  actor?: Actor;
};

@Injectable()
export class ActorGuard implements CanActivate {
  constructor(private readonly resolver: ActorResolverService) {}

  canActivate(context: ExecutionContext): boolean {
    const req = context.switchToHttp().getRequest<ActorRequest>();
    req.actor = this.resolver.resolveAuthorizationHeader(req.headers.authorization);
    return true;
  }
}

export const CurrentActor = createParamDecorator((_data: unknown, context: ExecutionContext): Actor => {
  const req = context.switchToHttp().getRequest<ActorRequest>();
  if (!req.actor) throw new UnauthorizedException("Request was not authenticated");
  return req.actor;
});
