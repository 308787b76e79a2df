import crypto from 'node:crypto';

export type IdentifierContext = 'user' | 'chat';

const PREFIX: Record<IdentifierContext, string> = {
  user: 'u',
  chat: 'c',
};

export class IdentifierMasker {
  constructor(private readonly salt: string) {}

  mask(id: number | string, context: IdentifierContext = 'user'): string {
    const digest = crypto
      .createHmac('sha256', this.salt)
      .update(`${context}:${id}`)
      .digest('hex');

    return `${PREFIX[context]}_${digest.slice(0, 16)}`;
  }

  maskUser(id: number): string {
    return this.mask(id, 'user');
  }

  maskChat(id: number): string {
    return this.mask(id, 'chat');
  }
}
