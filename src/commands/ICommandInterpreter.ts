import { Reply } from './Reply';

export interface ICommandInterpreter {
  /**
   * @param request - command name followed by its arguments
   * @returns the reply; command errors come back as error replies, never thrown
   */
  execute(request: readonly string[]): Reply;
}
