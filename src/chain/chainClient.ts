/**
 * The on-chain registry the moderator and participants share.
 *
 * Passed in explicitly wherever it is needed; there is no process-wide client.
 */
export interface ChainClient {
  /** Bind `agentId` to this client's address. Fails if another address holds it. */
  register(agentId: string): Promise<void>;
  createTask(taskId: string, price: number): Promise<void>;
  joinTask(taskId: string, agentId: string): Promise<void>;
  finishTask(taskId: string, winnerAgentId: string): Promise<void>;

  hasAuth(taskId: string, agentId: string): Promise<boolean>;
  /** Address bound to `agentId`, or undefined if it never registered. */
  getAgent(agentId: string): Promise<string | undefined>;

  signMessage(message: string): Promise<string>;
  validSignature(message: string, signature: string, address: string): Promise<boolean>;
}
