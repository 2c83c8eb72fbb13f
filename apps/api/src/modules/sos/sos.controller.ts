import { Controller, Get, Query } from "@nestjs/common";
import { Throttle } from "@nestjs/throttler";
import { ContactsQueryDto } from "./dto";
import { SosService } from "./sos.service";

@Controller("sos")
export class SosController {
  constructor(private readonly sos: SosService) {}

  @Get("contacts")
  @Throttle({ default: { limit: 30, ttl: 60000 } })
  async contacts(@Query() query: ContactsQueryDto) {
    const contacts = await this.sos.getEmergencyContacts(query.country ?? "");
    return { success: true, message: "Crisis resources retrieved successfully", contacts, source: contacts.origin };
  }
}
