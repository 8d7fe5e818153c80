import {
  CanActivate,
  ExecutionContext,
  Inject,
  Injectable,
  UnauthorizedException
} from "@nestjs/common";
import { Request } from "express";
import { SupabaseService } from "../supabase/supabase.service";
import { type ActingUser, toActingUser } from "./acting-user";

/** Request after {@link SupabaseAuthGuard} has let it through. */
export type AuthenticatedRequest = Request & {
  actingUser: ActingUser;
};

type IncomingRequest = Request & {
  actingUser?: ActingUser;
};

type AccessTokenVerifier = Pick<SupabaseService, "getUserFromAccessToken">;

export function bearerTokenOf(authorization: string | undefined) {
  const match = /^bearer\s+(.*)$/i.exec(authorization ?? "");
  const token = match?.[1]?.trim();
  return token ? token : null;
}

/**
 * Lets a request through when its bearer token belongs to a Supabase user,
 * who becomes the acting user for audit rows.
 */
@Injectable()
export class SupabaseAuthGuard implements CanActivate {
  constructor(
    @Inject(SupabaseService) private readonly verifier: AccessTokenVerifier
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const req = context.switchToHttp().getRequest<IncomingRequest>();
    req.actingUser = await this.authenticate(req.headers.authorization);
    return true;
  }

  async authenticate(authorization: string | undefined): Promise<ActingUser> {
    const accessToken = bearerTokenOf(authorization);
    if (!accessToken) {
      throw new UnauthorizedException("Price changes need a bearer token");
    }

    const user = await this.verifier.getUserFromAccessToken(accessToken);
    if (!user) {
      throw new UnauthorizedException("Access token is not valid for this project");
    }

    return toActingUser(user);
  }
}
