/**
 * Raised when a tracked element has no enclosing ScrollDetailProvider.
 * Without one, exposure would silently never fire.
 */
export class ExposureConfigurationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ExposureConfigurationError'
  }
}

export const missingProviderError = (): ExposureConfigurationError =>
  new ExposureConfigurationError(
    'Exposure tracking requires a scroll event channel, but none was found. ' +
    'Wrap the tracked element in <ScrollDetailProvider> or call provideScrollDetail() in an ancestor component.'
  )
