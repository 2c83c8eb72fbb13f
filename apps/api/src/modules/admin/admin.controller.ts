import { Controller, Logger, Post, Query, UseGuards } from "@nestjs/common";
import { BasicAuthGuard } from "../../common/guards/basic-auth.guard";
import { ContactsQueryDto } from "../sos/dto";
import { SosService } from "../sos/sos.service";

@UseGuards(BasicAuthGuard)
@Controller("admin")
export class AdminController {
  private readonly logger = new Logger(AdminController.name);

  constructor(private readonly sos: SosService) {}

  /**
   * Bypass the fresh-cache fast path and refetch contacts for a country.
   *
   * Usage:
   *   POST /admin/sos/refresh?country=India
   */
  @Post("sos/refresh")
  async refreshContacts(@Query() query: ContactsQueryDto) {
    this.logger.log(`Forced refresh requested for ${query.country || "default country"}`);
    const contacts = await this.sos.getEmergencyContacts(query.country ?? "", { forceRefresh: true });
    return { success: contacts.origin === "fresh", contacts, source: contacts.origin };
  }
}
