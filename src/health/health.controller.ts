import { Controller, Get, Redirect } from "@nestjs/common";
import { ApiExcludeEndpoint, ApiOkResponse, ApiTags } from "@nestjs/swagger";
import {
  ConsumerManager,
  IngestionHealth,
} from "../ingestion/consumer-manager";

@ApiTags("Health")
@Controller()
export class HealthController {
  constructor(private readonly consumers: ConsumerManager) {}

  @Get()
  @Redirect("/docs", 302)
  @ApiExcludeEndpoint()
  root() {}

  @Get("health")
  @ApiOkResponse({ description: "Overall status plus one entry per queue" })
  health(): IngestionHealth {
    return this.consumers.health();
  }

  @Get("ping")
  @ApiOkResponse({ schema: { type: "string", example: "pong" } })
  ping(): string {
    return "pong";
  }
}
