import { Module } from "@nestjs/common";
import { UpstreamClient } from "./upstream.client.js";
import { UPSTREAM_API } from "./upstream.types.js";

@Module({
  providers: [{ provide: UPSTREAM_API, useClass: UpstreamClient }],
  exports: [UPSTREAM_API],
})
export class UpstreamModule {}
