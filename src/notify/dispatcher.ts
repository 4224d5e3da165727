import { errorMessage } from "../errors.js";
import { episodeLabel } from "../library/naming.js";
import { log } from "../ui/logger.js";
import type { MailMessage, Mailer } from "./mailer.js";

export type NotificationEvent = {
	channel: string;
	season: number;
	episode: string;
	title: string;
	postUrl: string;
	succeeded: boolean;
	log: string;
	path?: string;
};

export interface Notifier {
	notify(event: NotificationEvent): Promise<void>;
}

export function composeNotification(
	to: string,
	event: NotificationEvent,
): MailMessage {
	const label = `${episodeLabel(event)} - ${event.title}`;

	if (event.succeeded) {
		return {
			to,
			subject: `Boosty: downloaded ${event.channel} ${label}`,
			body: [
				`Downloaded ${label}`,
				"",
				`Channel: ${event.channel}`,
				`Post: ${event.postUrl}`,
				...(event.path ? [`File: ${event.path}`] : []),
			].join("\n"),
		};
	}

	return {
		to,
		subject: `Boosty: failed to download ${event.channel} ${label}`,
		body: [
			`Failed to download ${label}`,
			"",
			`Channel: ${event.channel}`,
			`Post: ${event.postUrl}`,
			"",
			"Log:",
			event.log || "(no output)",
		].join("\n"),
	};
}

/** Best-effort: without a recipient it does nothing, and send failures are only logged. */
export class NotificationDispatcher implements Notifier {
	constructor(
		private readonly mailer: Mailer,
		private readonly to?: string,
	) {}

	async notify(event: NotificationEvent): Promise<void> {
		if (!this.to) return;

		try {
			await this.mailer.send(composeNotification(this.to, event));
		} catch (error) {
			log.warn(`Failed to send notification: ${errorMessage(error)}`, {
				channel: event.channel,
			});
		}
	}
}
