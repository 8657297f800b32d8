// ── Module ──────────────────────────────────────────────────
export { AuthModule } from './auth.module';

// ── Guards (for use in other feature modules) ───────────────
export { BearerAuthGuard } from './guards';

// ── Decorators (for use in other feature modules) ───────────
export { CurrentUser } from './decorators';

// ── Interfaces (for typing in other feature modules) ────────
export type { RequestUser } from './interfaces';

// ── Tokens ──────────────────────────────────────────────────
export { TokensModule } from './tokens/tokens.module';
export { AccessTokenService } from './tokens/access-token.service';
