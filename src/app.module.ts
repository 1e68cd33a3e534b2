import { WebserverModule } from '@infra/webserver/webserver.module';
import { GatewayModule } from '@modules/gateway/gateway.module';
import { Module } from '@nestjs/common';

@Module({
  imports: [
    // Infra
    WebserverModule,

    // Features
    GatewayModule,
  ],
})
export class AppModule {}
