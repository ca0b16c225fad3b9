import { UsageException } from '@/core/exceptions';
import { ConfigManager } from './config-manager';

export class TypedConfig {
  private config: ConfigManager;

  constructor(config: ConfigManager) {
    this.config = config;
  }

  get serviceUri(): string | null {
    return this.config.get('service.uri')?.asString() || null;
  }

  get serviceToken(): string | null {
    return this.config.get('service.token')?.asString() || null;
  }

  get userId(): string | null {
    return this.config.get('user.id')?.asString() || null;
  }

  get remoteHooksInstalled(): boolean {
    return this.config.get('workingCopy.remoteHooksInstalled')?.asBoolean() ?? false;
  }

  get commitLocale(): string {
    return this.config.get('commit.locale')?.asString() || 'en_US.UTF-8';
  }

  get commitEncoding(): string {
    return this.config.get('commit.encoding')?.asString() || 'UTF-8';
  }

  get svnBinary(): string {
    return this.config.get('svn.binary')?.asString() || 'svn';
  }

  requireServiceUri(): string {
    const uri = this.serviceUri;
    if (!uri) {
      throw new UsageException(
        'No review service is configured.',
        'Set "service.uri" in .revcommit.json or pass --service-uri.'
      );
    }
    return uri;
  }

  requireUserId(): string {
    const id = this.userId;
    if (!id) {
      throw new UsageException(
        'No user identity is configured.',
        'Set "user.id" in ~/.config/revcommit/config.json.'
      );
    }
    return id;
  }
}
