import type { CommandDescriptor, CommandRegistry } from './types.js';

export class CommandRouter implements CommandRegistry {
  private readonly descriptors = new Map<string, CommandDescriptor>();

  private readonly aliases = new Map<string, string>();

  register(descriptor: CommandDescriptor): void {
    if (this.descriptors.has(descriptor.name) || this.aliases.has(descriptor.name)) {
      throw new Error(`Command '${descriptor.name}' is already registered`);
    }

    this.descriptors.set(descriptor.name, descriptor);

    for (const alias of descriptor.aliases ?? []) {
      this.aliases.set(alias, descriptor.name);
    }
  }

  find(name: string): CommandDescriptor | undefined {
    return this.descriptors.get(this.aliases.get(name) ?? name);
  }

  list(): CommandDescriptor[] {
    return [...this.descriptors.values()].sort((a, b) => a.name.localeCompare(b.name));
  }
}
