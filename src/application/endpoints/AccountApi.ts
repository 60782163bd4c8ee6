import type { ApiResponse } from '../../domain/model/ApiResponse.js';
import type { ApiContext } from '../ApiContext.js';

/** Account-level calls. Each one sends only the authentication parameters. */
export class AccountApi {
  constructor(private readonly ctx: ApiContext) {}

  /** Check that the configured credentials are accepted. */
  getLogin(): Promise<ApiResponse> {
    return this.ctx.run('account.getLogin', () => this.ctx.get('dns/login.json', this.ctx.parameters({})));
  }

  getNameservers(): Promise<ApiResponse> {
    return this.ctx.run('account.getNameservers', () =>
      this.ctx.get('dns/available-name-servers.json', this.ctx.parameters({})),
    );
  }

  /** The public address the API sees this client calling from. */
  getMyIp(): Promise<ApiResponse> {
    return this.ctx.run('account.getMyIp', () => this.ctx.get('ip/get-my-ip.json', this.ctx.parameters({})));
  }
}
