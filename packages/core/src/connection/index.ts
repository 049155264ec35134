export { ConnectionManager, toSessionFactoryConfig } from "./connection-manager"
export type { Connection, ConnectionManagerOptions, ConnectionState, ConnectionStatus } from "./connection-manager"
