/**
 * Event system for structured logging throughout the deployment process.
 * Library code reports progress through these events instead of the console.
 */

export interface BaseEvent {
  type: string
  timestamp: Date
  level: 'info' | 'warn' | 'error' | 'debug'
}

// Run lifecycle events
export interface DeploymentStartedEvent extends BaseEvent {
  type: 'deployment_started'
  level: 'info'
  data: {
    rpcUrl: string
    variant: 'production' | 'mock'
    predeployed: string[]
  }
}

export interface DeploymentCompletedEvent extends BaseEvent {
  type: 'deployment_completed'
  level: 'info'
  data: {
    address: string
  }
}

export interface DeploymentFailedEvent extends BaseEvent {
  type: 'deployment_failed'
  level: 'error'
  data: {
    error: string
    stack?: string
    contract?: string
  }
}

export interface NetworkSignerInfoEvent extends BaseEvent {
  type: 'network_signer_info'
  level: 'info'
  data: {
    chainId: number
    address: string
  }
}

// Per-contract events
export interface ContractDeploymentSkippedEvent extends BaseEvent {
  type: 'contract_deployment_skipped'
  level: 'info'
  data: {
    contract: string
    address: string
  }
}

export interface ContractDeploymentStartedEvent extends BaseEvent {
  type: 'contract_deployment_started'
  level: 'info'
  data: {
    contract: string
  }
}

export interface ContractDeployedEvent extends BaseEvent {
  type: 'contract_deployed'
  level: 'info'
  data: {
    contract: string
    address: string
  }
}

export interface ContractDeploymentFailedEvent extends BaseEvent {
  type: 'contract_deployment_failed'
  level: 'error'
  data: {
    contract: string
    error: string
  }
}

export interface LibraryLinkedEvent extends BaseEvent {
  type: 'library_linked'
  level: 'debug'
  data: {
    contractName: string
    library: string
    address: string
  }
}

// Transaction events
export interface TransactionSentEvent extends BaseEvent {
  type: 'transaction_sent'
  level: 'info'
  data: {
    to: string
    contractName?: string
    dataPreview: string
    txHash: string
  }
}

export interface TransactionConfirmedEvent extends BaseEvent {
  type: 'transaction_confirmed'
  level: 'info'
  data: {
    txHash: string
    blockNumber: number
    contractAddress?: string
  }
}

// Output events
export interface AddressesWrittenEvent extends BaseEvent {
  type: 'addresses_written'
  level: 'info'
  data: {
    destination: string
    count: number
  }
}

// Error handling events
export interface UnhandledRejectionEvent extends BaseEvent {
  type: 'unhandled_rejection'
  level: 'error'
  data: {
    reason: unknown
  }
}

export interface UncaughtExceptionEvent extends BaseEvent {
  type: 'uncaught_exception'
  level: 'error'
  data: {
    error: unknown
  }
}

export interface CLIErrorEvent extends BaseEvent {
  type: 'cli_error'
  level: 'error'
  data: {
    message: string
  }
}

// Union type of all events
export type DeploymentEvent =
  | DeploymentStartedEvent
  | DeploymentCompletedEvent
  | DeploymentFailedEvent
  | NetworkSignerInfoEvent
  | ContractDeploymentSkippedEvent
  | ContractDeploymentStartedEvent
  | ContractDeployedEvent
  | ContractDeploymentFailedEvent
  | LibraryLinkedEvent
  | TransactionSentEvent
  | TransactionConfirmedEvent
  | AddressesWrittenEvent
  | UnhandledRejectionEvent
  | UncaughtExceptionEvent
  | CLIErrorEvent

// An event as passed to `emitEvent`, before the timestamp is filled in
type WithoutTimestamp<E> = E extends DeploymentEvent ? Omit<E, 'timestamp'> : never
export type DeploymentEventInput = WithoutTimestamp<DeploymentEvent>
