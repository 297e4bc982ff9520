import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { ProviderState, ProviderStateSnapshot } from './models';

/**
 * Per-provider failure tracking shared by every symbol routed to that
 * provider. There is no explicit half-open phase: once the cooldown has
 * passed the next attempt goes through and its outcome updates the state.
 */
@Injectable()
export class CircuitBreakerService {
  private readonly logger = new Logger(CircuitBreakerService.name);
  private readonly states = new Map<string, ProviderState>();
  private readonly failThreshold: number;
  private readonly failWindowMs: number;
  private readonly cooldownMs: number;

  constructor(configService: ConfigService) {
    this.failThreshold = configService.get<number>('QUOTE_FAIL_THRESHOLD', 3);
    this.failWindowMs = configService.get<number>('QUOTE_FAIL_WINDOW_SECONDS', 60) * 1000;
    this.cooldownMs = configService.get<number>('QUOTE_COOLDOWN_SECONDS', 120) * 1000;
  }

  isAvailable(provider: string, now = Date.now()): boolean {
    const state = this.states.get(provider);
    return !state || now >= state.cooldownUntil;
  }

  recordSuccess(provider: string): void {
    this.states.delete(provider);
  }

  recordFailure(provider: string, now = Date.now()): void {
    let state = this.states.get(provider);
    if (!state) {
      state = { failCount: 0, windowStart: now, cooldownUntil: 0 };
      this.states.set(provider, state);
    }
    if (now - state.windowStart > this.failWindowMs) {
      state.failCount = 0;
      state.windowStart = now;
    }
    state.failCount += 1;
    if (state.failCount >= this.failThreshold) {
      state.cooldownUntil = now + this.cooldownMs;
      this.logger.warn(
        JSON.stringify({
          event: 'provider_cooldown_started',
          provider,
          failCount: state.failCount,
          cooldownUntil: new Date(state.cooldownUntil).toISOString(),
        }),
      );
    }
  }

  getState(provider: string): ProviderState | null {
    const state = this.states.get(provider);
    return state ? { ...state } : null;
  }

  snapshot(now = Date.now()): ProviderStateSnapshot[] {
    return Array.from(this.states.entries()).map(([provider, state]) => ({
      provider,
      ...state,
      available: now >= state.cooldownUntil,
    }));
  }

  reset(): void {
    this.states.clear();
  }
}
