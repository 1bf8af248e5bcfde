import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { DiscoveryService, Reflector } from '@nestjs/core';
import { DuplicateActionHandlerError } from '../errors/duplicate-action-handler.error';
import type { ActionHandlerMetadata } from '../decorators/action-handler.decorator';
import type { IActionHandler } from '../interfaces/action-handler.interface';
import { ACTION_HANDLER_METADATA } from '../nurture-engine.constants';

export interface RegisteredActionHandler {
  actionKind: string;
  handler: IActionHandler;
  handlerName: string;
}

function isActionHandler(value: unknown): value is IActionHandler {
  return (
    typeof value === 'object' &&
    value !== null &&
    'execute' in value &&
    typeof value.execute === 'function'
  );
}

@Injectable()
export class ActionHandlerRegistry implements OnModuleInit {
  private readonly logger = new Logger(ActionHandlerRegistry.name);
  private readonly registrations = new Map<string, RegisteredActionHandler>();

  constructor(
    private readonly discoveryService: DiscoveryService,
    private readonly reflector: Reflector,
  ) {}

  onModuleInit(): void {
    const providers = this.discoveryService.getProviders();
    for (const wrapper of providers) {
      if (!wrapper.metatype) continue;

      const metadata = this.reflector.get<ActionHandlerMetadata | undefined>(
        ACTION_HANDLER_METADATA,
        wrapper.metatype,
      );
      if (!metadata) continue;

      if (!isActionHandler(wrapper.instance)) {
        throw new Error(
          `${wrapper.metatype.name} is marked @ActionHandler("${metadata.actionKind}") but has no execute() method`,
        );
      }

      this.register(metadata.actionKind, wrapper.instance, wrapper.metatype.name);
      this.logger.log(
        `Registered action handler: ${wrapper.metatype.name} -> ${metadata.actionKind}`,
      );
    }
  }

  register(
    actionKind: string,
    handler: IActionHandler,
    handlerName: string = handler.constructor.name,
  ): void {
    const existing = this.registrations.get(actionKind);
    if (existing) {
      throw new DuplicateActionHandlerError(
        actionKind,
        existing.handlerName,
        handlerName,
      );
    }
    this.registrations.set(actionKind, { actionKind, handler, handlerName });
  }

  get(actionKind: string): IActionHandler | undefined {
    return this.registrations.get(actionKind)?.handler;
  }

  has(actionKind: string): boolean {
    return this.registrations.has(actionKind);
  }

  getKinds(): string[] {
    return Array.from(this.registrations.keys());
  }
}
