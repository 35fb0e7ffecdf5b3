/**
 * Lightweight Dependency Injection Container
 *
 * Supports singleton and transient lifetimes with lazy construction and
 * circular dependency detection.
 */

export type ServiceId = string | symbol;

export type Factory<T> = (container: Container) => T;

interface Binding {
  factory: Factory<unknown>;
  singleton: boolean;
  instance?: unknown;
  resolved: boolean;
}

export interface ServiceInfo {
  singleton: boolean;
  resolved: boolean;
}

export class Container {
  private bindings = new Map<ServiceId, Binding>();
  private resolving = new Set<ServiceId>();

  /**
   * Register a transient service (new instance per get)
   */
  bind<T>(id: ServiceId, factory: Factory<T>): this {
    this.bindings.set(id, { factory, singleton: false, resolved: false });
    return this;
  }

  /**
   * Register a singleton service (constructed once, on first get)
   */
  singleton<T>(id: ServiceId, factory: Factory<T>): this {
    this.bindings.set(id, { factory, singleton: true, resolved: false });
    return this;
  }

  /**
   * Resolve a service
   *
   * @throws Error if no binding exists or a circular dependency is detected
   */
  get<T>(id: ServiceId): T {
    const binding = this.bindings.get(id);
    if (!binding) {
      throw new Error(`No binding found for '${String(id)}'`);
    }

    if (binding.singleton && binding.resolved) {
      return binding.instance as T;
    }

    if (this.resolving.has(id)) {
      const chain = [...this.resolving, id].map(String).join(" -> ");
      throw new Error(`Circular dependency detected: ${chain}`);
    }

    this.resolving.add(id);
    try {
      const instance = binding.factory(this);
      if (binding.singleton) {
        binding.instance = instance;
        binding.resolved = true;
      }
      return instance as T;
    } finally {
      this.resolving.delete(id);
    }
  }

  has(id: ServiceId): boolean {
    return this.bindings.has(id);
  }

  unbind(id: ServiceId): void {
    this.bindings.delete(id);
  }

  getRegisteredServices(): ServiceId[] {
    return [...this.bindings.keys()];
  }

  getServiceInfo(id: ServiceId): ServiceInfo | undefined {
    const binding = this.bindings.get(id);
    if (!binding) {
      return undefined;
    }
    return { singleton: binding.singleton, resolved: binding.resolved };
  }

  /**
   * Drop every registration and cached instance
   */
  reset(): void {
    this.bindings.clear();
    this.resolving.clear();
  }
}

/** Process-wide container used by bootstrapContainer() */
export const container = new Container();
