import { Controller, Get } from '@nestjs/common';
import { CircuitBreakerService, ProviderRegistryService, QuoteCacheService } from '@libs/quotes';
import type { ProviderSnapshot, ProviderStateSnapshot } from '@libs/quotes';

@Controller('health')
export class HealthController {
  constructor(
    private readonly registry: ProviderRegistryService,
    private readonly breaker: CircuitBreakerService,
    private readonly cache: QuoteCacheService,
  ) {}

  @Get()
  health(): { status: string } {
    return { status: 'ok' };
  }

  @Get('providers')
  providers(): {
    status: string;
    chain: { provider: string; available: boolean }[];
    breakers: ProviderStateSnapshot[];
    providers: ProviderSnapshot[];
    cacheSize: number;
  } {
    return {
      status: 'ok',
      chain: this.registry
        .providerNames()
        .map((provider) => ({ provider, available: this.breaker.isAvailable(provider) })),
      breakers: this.breaker.snapshot(),
      providers: this.registry.getSnapshots(),
      cacheSize: this.cache.size,
    };
  }
}
