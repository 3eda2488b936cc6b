import { type User, type NewUser, type Role, type UserRepository } from '@contacts/domain';
import { PgRepository, toDate, toNullableString } from '../base-repository';

const USER_COLUMNS =
  'id, username, email, password_hash, avatar, confirmed, role, created_at, updated_at';

export class PgUserRepository extends PgRepository<User, NewUser> implements UserRepository {
  protected readonly table = 'users';
  protected readonly columns = USER_COLUMNS;
  protected readonly hasUpdatedAt = true;

  async findByUsername(username: string): Promise<User | null> {
    return this.findOne('username = $1', [username]);
  }

  async findByEmail(email: string): Promise<User | null> {
    return this.findOne('email = $1', [email]);
  }

  async confirmEmail(email: string): Promise<void> {
    await this.db.query(
      `UPDATE users SET confirmed = TRUE, updated_at = NOW() WHERE email = $1`,
      [email],
    );
  }

  async updateAvatar(id: string, url: string): Promise<User | null> {
    return this.updateById(id, { avatar: url });
  }

  async updatePassword(email: string, passwordHash: string): Promise<void> {
    await this.db.query(
      `UPDATE users SET password_hash = $2, updated_at = NOW() WHERE email = $1`,
      [email, passwordHash],
    );
  }

  protected toRow(user: NewUser): Record<string, unknown> {
    return {
      username: user.username,
      email: user.email,
      password_hash: user.passwordHash,
      avatar: user.avatar,
      role: user.role,
    };
  }

  protected mapRow(row: Record<string, unknown>): User {
    return mapUserRow(row);
  }
}

function toRole(value: unknown): Role {
  return value === 'admin' ? 'admin' : 'user';
}

export function mapUserRow(row: Record<string, unknown>): User {
  return {
    id: String(row.id),
    username: String(row.username),
    email: String(row.email),
    passwordHash: String(row.password_hash),
    avatar: toNullableString(row.avatar),
    confirmed: row.confirmed === true,
    role: toRole(row.role),
    createdAt: toDate(row.created_at),
    updatedAt: toDate(row.updated_at),
  };
}
