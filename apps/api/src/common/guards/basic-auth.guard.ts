import { CanActivate, ExecutionContext, Injectable, UnauthorizedException } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";

interface RequestWithHeaders {
  headers?: { authorization?: string };
}

@Injectable()
export class BasicAuthGuard implements CanActivate {
  constructor(private readonly cfg: ConfigService) {}

  canActivate(context: ExecutionContext): boolean {
    const req = context.switchToHttp().getRequest<RequestWithHeaders>();
    const header = req.headers?.authorization;
    if (!header || !header.startsWith("Basic ")) throw new UnauthorizedException("Missing Basic auth");

    const expectedUser = this.cfg.get<string>("ADMIN_BASIC_USER");
    const expectedPass = this.cfg.get<string>("ADMIN_BASIC_PASS");
    if (!expectedUser || !expectedPass) throw new UnauthorizedException("Admin access is not configured");

    const decoded = Buffer.from(header.slice(6), "base64").toString("utf-8");
    const sep = decoded.indexOf(":");
    const user = sep === -1 ? decoded : decoded.slice(0, sep);
    const pass = sep === -1 ? "" : decoded.slice(sep + 1);
    const ok = user === expectedUser && pass === expectedPass;
    if (!ok) throw new UnauthorizedException("Invalid credentials");
    return true;
  }
}
