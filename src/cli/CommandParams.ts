/**
 * Typed accessor over a command's validated flags.
 *
 * Commands subclass this and expose each flag as a getter, so the run
 * logic never reads raw option objects.
 *
 * @example
 * ```typescript
 * class BuildParams extends CommandParams<{ 'dry-run'?: boolean; verbose?: boolean }> {
 *   get Verbose(): boolean {
 *     return this.Flag('verbose') ?? false;
 *   }
 * }
 * ```
 */
export abstract class CommandParams<TFlags extends object> {
  public constructor(protected flags: TFlags) {}

  public get Flags(): Readonly<TFlags> {
    return this.flags;
  }

  protected Flag<K extends keyof TFlags>(key: K): TFlags[K] {
    return this.flags[key];
  }
}
