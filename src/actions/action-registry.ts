import { ConfigurationError } from '../config.js';
import { unknownNameError } from '../utils/target-validator.js';
import type { Action, ActionDefinition, ActionDependency } from './types.js';

/**
 * Named actions defined during one configuration pass.
 *
 * Names are unique: defining a name twice is a configuration error, never an
 * overwrite. Dependencies only point from an action to the ones it needs.
 */
export class ActionRegistry {
  private readonly actions = new Map<string, Action>();

  public define(definition: ActionDefinition): Action {
    if (this.actions.has(definition.name)) {
      throw new ConfigurationError(
        `Action "${definition.name}" is already defined; each action name may only be registered once`
      );
    }

    const action: Action = {
      name: definition.name,
      description: definition.description,
      workingDirectory: definition.workingDirectory,
      steps: [...(definition.steps ?? [])],
      dependencies: [...(definition.dependencies ?? [])],
    };
    this.actions.set(action.name, action);
    return action;
  }

  /**
   * Define an aggregate action (no steps) unless it already exists.
   */
  public ensureAggregate(name: string, description: string): Action {
    return this.actions.get(name) ?? this.define({ name, description });
  }

  public addDependency(actionName: string, dependency: ActionDependency): void {
    const action = this.require(actionName);
    const present = action.dependencies.some(
      (existing) => existing.kind === dependency.kind && existing.name === dependency.name
    );
    if (!present) {
      action.dependencies.push(dependency);
    }
  }

  public has(name: string): boolean {
    return this.actions.has(name);
  }

  public get(name: string): Action | undefined {
    return this.actions.get(name);
  }

  public require(name: string): Action {
    const action = this.actions.get(name);
    if (!action) {
      throw unknownNameError('action', name, this.names());
    }
    return action;
  }

  /** Action names in definition order. */
  public names(): string[] {
    return [...this.actions.keys()];
  }

  public list(): Action[] {
    return [...this.actions.values()];
  }

  public get size(): number {
    return this.actions.size;
  }
}
