import { Controller, Get, Logger, ServiceUnavailableException } from "@nestjs/common";
import { DatabaseService } from "../database/database.service";

@Controller("health")
export class HealthController {
  private readonly logger = new Logger(HealthController.name);

  constructor(private readonly database: DatabaseService) {}

  @Get()
  async health() {
    try {
      await this.database.ping();
      return { status: "ok" };
    } catch (error) {
      this.logger.warn(`Database ping failed: ${error instanceof Error ? error.message : String(error)}`);
      throw new ServiceUnavailableException("Database unavailable");
    }
  }
}
