import { type RefreshToken, type NewRefreshToken, type RefreshTokenRepository } from '@contacts/domain';
import { PgRepository, toDate, toNullableDate, toNullableString } from '../base-repository';

const REFRESH_TOKEN_COLUMNS =
  'id, user_id, token_hash, created_at, expires_at, revoked_at, ip_address, user_agent';

export class PgRefreshTokenRepository
  extends PgRepository<RefreshToken, NewRefreshToken>
  implements RefreshTokenRepository
{
  protected readonly table = 'refresh_tokens';
  protected readonly columns = REFRESH_TOKEN_COLUMNS;

  async findByTokenHash(hash: string): Promise<RefreshToken | null> {
    return this.findOne('token_hash = $1', [hash]);
  }

  async findActiveToken(hash: string, now: Date): Promise<RefreshToken | null> {
    return this.findOne('token_hash = $1 AND revoked_at IS NULL AND expires_at > $2', [hash, now]);
  }

  async revoke(id: string): Promise<void> {
    await this.db.query(
      `UPDATE refresh_tokens SET revoked_at = NOW() WHERE id = $1 AND revoked_at IS NULL`,
      [id],
    );
  }

  async deleteExpired(olderThanDays: number): Promise<number> {
    const result = await this.db.query(
      `DELETE FROM refresh_tokens
       WHERE (expires_at < NOW() - make_interval(days => $1))
          OR (revoked_at IS NOT NULL AND revoked_at < NOW() - make_interval(days => $1))`,
      [olderThanDays],
    );
    return result.rowCount ?? 0;
  }

  protected toRow(token: NewRefreshToken): Record<string, unknown> {
    return {
      user_id: token.userId,
      token_hash: token.tokenHash,
      expires_at: token.expiresAt,
      ip_address: token.ipAddress,
      user_agent: token.userAgent,
    };
  }

  protected mapRow(row: Record<string, unknown>): RefreshToken {
    return {
      id: String(row.id),
      userId: String(row.user_id),
      tokenHash: String(row.token_hash),
      createdAt: toDate(row.created_at),
      expiresAt: toDate(row.expires_at),
      revokedAt: toNullableDate(row.revoked_at),
      ipAddress: toNullableString(row.ip_address),
      userAgent: toNullableString(row.user_agent),
    };
  }
}
