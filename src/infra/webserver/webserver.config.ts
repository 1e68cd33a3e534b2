import { ConfigFragment } from '@common/config/config-fragment';
import { UseEnv } from '@common/config/use-env.decorator';
import { IsInt, IsOptional, IsString, Max, Min } from 'class-validator';

export class WebserverConfig extends ConfigFragment {
  /**
   * HTTP port
   * Default: 3000
   */
  @IsInt()
  @Min(1)
  @Max(65535)
  @UseEnv('PORT', (value?: string) => (value ? parseInt(value, 10) : 3000))
  public readonly port!: number;

  /**
   * Address the service is reachable at, used in the startup log
   * Default: http://localhost:<port>
   */
  @IsString()
  @IsOptional()
  @UseEnv('PUBLIC_URL')
  public readonly publicUrl?: string;
}
