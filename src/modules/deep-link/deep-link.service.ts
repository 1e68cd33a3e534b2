import { Injectable, Logger } from '@nestjs/common';
import { parseLink } from './deep-link.parser';
import { LinkParseResult } from './deep-link.types';

@Injectable()
export class DeepLinkService {
  private readonly logger = new Logger(DeepLinkService.name);

  public parse(link: string): LinkParseResult {
    const result = parseLink(link);

    if (result.warning) {
      const target = result.destination ?? 'no destination';
      this.logger.warn(`Deep link flagged (${target}): ${result.warning}`);
    }

    return result;
  }
}
