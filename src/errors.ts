export class CrashtrackError extends Error {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = new.target.name;
	}
}

// Reporter or synchronizer used with a missing or unusable client/project pair.
export class ConfigurationError extends CrashtrackError {}

export class TrackerApiError extends CrashtrackError {
	readonly status: number | null;

	constructor(message: string, status: number | null = null, options?: ErrorOptions) {
		super(message, options);
		this.status = status;
	}
}

export class NotFoundError extends TrackerApiError {}

export class AuthError extends TrackerApiError {}

export class FormattingError extends CrashtrackError {}
