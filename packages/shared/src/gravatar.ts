import { createHash } from 'node:crypto';
import { type AvatarResolver } from '@contacts/domain';

const GRAVATAR_BASE_URL = 'https://www.gravatar.com/avatar';

export function gravatarUrl(email: string, size = 250): string {
  const digest = createHash('md5').update(email.trim().toLowerCase()).digest('hex');
  return `${GRAVATAR_BASE_URL}/${digest}?s=${size}&d=identicon`;
}

export class GravatarAvatarResolver implements AvatarResolver {
  constructor(private readonly size = 250) {}

  async defaultAvatarFor(email: string): Promise<string | null> {
    return gravatarUrl(email, this.size);
  }
}
