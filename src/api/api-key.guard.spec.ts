import { UnauthorizedException } from '@nestjs/common';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { testConfig } from '../testing/test-config';
import { ApiKeyGuard } from './api-key.guard';

function requestWith(headers: Record<string, string | string[]>) {
  return new ExecutionContextHost([{ headers }]);
}

describe('ApiKeyGuard', () => {
  it('lets everything through when no key is configured', () => {
    const guard = new ApiKeyGuard(testConfig({ notifyApiKey: null }));

    expect(guard.canActivate(requestWith({}))).toBe(true);
  });

  it('accepts the configured key', () => {
    const guard = new ApiKeyGuard(testConfig({ notifyApiKey: 'test-secret' }));

    expect(guard.canActivate(requestWith({ 'x-api-key': 'test-secret' }))).toBe(true);
  });

  it('rejects a missing or wrong key', () => {
    const guard = new ApiKeyGuard(testConfig({ notifyApiKey: 'test-secret' }));

    expect(() => guard.canActivate(requestWith({}))).toThrow(UnauthorizedException);
    expect(() => guard.canActivate(requestWith({ 'x-api-key': 'test-secreT' }))).toThrow(UnauthorizedException);
    expect(() => guard.canActivate(requestWith({ 'x-api-key': 'short' }))).toThrow(UnauthorizedException);
  });
});
