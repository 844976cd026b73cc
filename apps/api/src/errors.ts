import { RunboardError } from '@runboard/core'

export class SettingsError extends RunboardError {
  readonly code = 'SETTINGS'
  readonly statusCode = 500
  constructor(message: string) {
    super(message)
    this.name = 'SettingsError'
  }
}

export class RegistryLoadError extends RunboardError {
  readonly code = 'REGISTRY_LOAD'
  readonly statusCode = 500
  constructor(file: string, detail: string) {
    super(`cannot load run registry ${file}: ${detail}`)
    this.name = 'RegistryLoadError'
  }
}

export class DispatcherClosedError extends RunboardError {
  readonly code = 'DISPATCHER_CLOSED'
  readonly statusCode = 503
  constructor() {
    super('job dispatcher is shutting down')
    this.name = 'DispatcherClosedError'
  }
}
