import { Module } from '@nestjs/common';
import { DeepLinkService } from './deep-link.service';

@Module({
  providers: [DeepLinkService],
  exports: [DeepLinkService],
})
export class DeepLinkModule {}
