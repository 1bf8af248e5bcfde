import { Injectable } from '@nestjs/common';
import { DiscoveryService, Reflector } from '@nestjs/core';
import { ActionHandler } from '../../src/decorators/action-handler.decorator';
import { DuplicateActionHandlerError } from '../../src/errors/duplicate-action-handler.error';
import type { ActionResult } from '../../src/interfaces/action-handler.interface';
import { ActionHandlerRegistry } from '../../src/services/action-handler-registry.service';
import { createActionHandler, createMockRegistry } from '../helpers';

@Injectable()
@ActionHandler('send_email')
class SendEmailHandler {
  async execute(): Promise<ActionResult> {
    return { success: true };
  }
}

@Injectable()
@ActionHandler('notify_sales')
class BrokenHandler {}

@Injectable()
class UnrelatedService {}

function createDiscoveringRegistry(
  providers: Array<{ metatype: Function; instance: unknown }>,
): ActionHandlerRegistry {
  const discovery = {
    getProviders: () => providers,
  } as unknown as DiscoveryService;
  return new ActionHandlerRegistry(discovery, new Reflector());
}

describe('ActionHandlerRegistry', () => {
  it('should register and look up handlers by kind', () => {
    const registry = createMockRegistry();
    const handler = createActionHandler();

    registry.register('send_email', handler, 'EmailHandler');

    expect(registry.get('send_email')).toBe(handler);
    expect(registry.has('send_email')).toBe(true);
    expect(registry.has('send_sms')).toBe(false);
    expect(registry.get('send_sms')).toBeUndefined();
    expect(registry.getKinds()).toEqual(['send_email']);
  });

  it('should reject a second handler for the same kind', () => {
    const registry = createMockRegistry();
    registry.register('send_email', createActionHandler(), 'EmailHandler');

    expect(() =>
      registry.register('send_email', createActionHandler(), 'OtherEmailHandler'),
    ).toThrow(
      new DuplicateActionHandlerError(
        'send_email',
        'EmailHandler',
        'OtherEmailHandler',
      ),
    );
  });

  it('should discover providers decorated with @ActionHandler', () => {
    const emailHandler = new SendEmailHandler();
    const registry = createDiscoveringRegistry([
      { metatype: SendEmailHandler, instance: emailHandler },
      { metatype: UnrelatedService, instance: new UnrelatedService() },
    ]);

    registry.onModuleInit();

    expect(registry.getKinds()).toEqual(['send_email']);
    expect(registry.get('send_email')).toBe(emailHandler);
  });

  it('should fail fast when a decorated provider has no execute method', () => {
    const registry = createDiscoveringRegistry([
      { metatype: BrokenHandler, instance: new BrokenHandler() },
    ]);

    expect(() => registry.onModuleInit()).toThrow(
      'BrokenHandler is marked @ActionHandler("notify_sales") but has no execute() method',
    );
  });

  it('should skip wrappers without a metatype', () => {
    const discovery = {
      getProviders: () => [{ metatype: null, instance: {} }],
    } as unknown as DiscoveryService;
    const registry = new ActionHandlerRegistry(discovery, new Reflector());

    registry.onModuleInit();

    expect(registry.getKinds()).toEqual([]);
  });
});
