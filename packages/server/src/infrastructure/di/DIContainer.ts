/**
 * Dependency Injection Container
 *
 * サービスとUse Caseの依存関係を管理する。登録名と型は Registry で決まる。
 */
export class DIContainer<Registry extends object> {
  private services: { [P in keyof Registry]?: Registry[P] } = {};

  /**
   * サービスを登録
   */
  register<K extends keyof Registry>(name: K, service: Registry[K]): void {
    this.services[name] = service;
  }

  /**
   * サービスを解決
   */
  resolve<K extends keyof Registry>(name: K): Registry[K] {
    const service: Registry[K] | undefined = this.services[name];
    if (service === undefined) {
      throw new Error(`Service not found: ${String(name)}`);
    }
    return service;
  }

  /**
   * サービスの存在確認
   */
  has(name: keyof Registry): boolean {
    return this.services[name] !== undefined;
  }

  /**
   * すべてのサービスをクリア
   */
  clear(): void {
    this.services = {};
  }
}
