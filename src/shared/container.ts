import { isInjectable } from './decorators';

export type ClassToken<T = unknown> = abstract new (...args: never[]) => T;
type Token = string | ClassToken;
type FactoryFunction<T> = () => T;

interface Binding {
  token: Token;
  factory: FactoryFunction<unknown>;
  singleton: boolean;
  instance?: unknown;
}

function describeToken(token: Token): string {
  return typeof token === 'string' ? token : token.name;
}

export class DIContainer {
  private bindings: Map<Token, Binding> = new Map();
  private static instance: DIContainer;

  static getInstance(): DIContainer {
    if (!DIContainer.instance) {
      DIContainer.instance = new DIContainer();
    }
    return DIContainer.instance;
  }

  bind<T>(token: string | ClassToken<T>, factory: FactoryFunction<T>, singleton: boolean = true): void {
    // Class tokens must be marked with @Injectable()
    if (typeof token === 'function' && !isInjectable(token)) {
      throw new Error(`Class ${token.name} is not marked @Injectable()`);
    }
    this.bindings.set(token, { token, factory, singleton });
  }

  get<T>(token: string | ClassToken<T>): T {
    const binding = this.bindings.get(token);

    if (!binding) {
      throw new Error(`No binding found for token: ${describeToken(token)}`);
    }

    if (binding.singleton && binding.instance !== undefined) {
      return binding.instance as T;
    }

    const instance = binding.factory();

    if (binding.singleton) {
      binding.instance = instance;
    }

    return instance as T;
  }

  has(token: Token): boolean {
    return this.bindings.has(token);
  }

  unbind(token: Token): void {
    this.bindings.delete(token);
  }
}
