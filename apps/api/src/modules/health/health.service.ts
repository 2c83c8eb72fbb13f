import { Injectable, Logger } from "@nestjs/common";
import { DatabaseService } from "../database/database.service";
import { describeError } from "../sos/sos.errors";

@Injectable()
export class HealthService {
  private readonly logger = new Logger(HealthService.name);

  constructor(private readonly database: DatabaseService) {}

  check() {
    try {
      this.database.ping();
      return {
        status: "ok",
        timestamp: new Date().toISOString(),
        cache: "connected"
      };
    } catch (error) {
      this.logger.error(`Health check failed: ${describeError(error)}`);
      return {
        status: "error",
        timestamp: new Date().toISOString(),
        cache: "disconnected"
      };
    }
  }
}
