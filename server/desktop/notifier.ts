import { logger } from '../logger.js'
import { isOnPath } from '../platform-utils.js'
import { spawnDetached, type DetachedLauncher } from '../process-runner.js'

const log = logger.child({ component: 'notifier' })

const APP_NAME = 'claw-launcher'
const DEFAULT_SECONDS = 3

export type NotifyOptions = {
  seconds?: number
}

export type NotifierDeps = {
  isAvailable: (name: string) => boolean
  launch: DetachedLauncher
}

const defaultDeps: NotifierDeps = {
  isAvailable: (name) => isOnPath(name),
  launch: spawnDetached,
}

export type Notifier = (message: string, options?: NotifyOptions) => Promise<void>

/** argv for the first available notifier, or null when only logging is possible. */
export function notificationCommand(
  message: string,
  seconds: number,
  isAvailable: NotifierDeps['isAvailable'],
): string[] | null {
  if (isAvailable('kdialog')) return ['kdialog', '--passivepopup', message, String(seconds)]
  if (isAvailable('notify-send')) return ['notify-send', APP_NAME, message]
  return null
}

export function createNotifier(deps: NotifierDeps = defaultDeps): Notifier {
  return async (message, options = {}) => {
    log.info({ notification: message }, 'notify')
    const command = notificationCommand(message, options.seconds ?? DEFAULT_SECONDS, deps.isAvailable)
    if (!command) return

    const result = await deps.launch(command[0], command.slice(1))
    if (!result.ok) {
      // Notifications are best effort; the log line above already carries the message.
      log.warn({ error: result.error }, 'Notification failed')
    }
  }
}

export const notify: Notifier = createNotifier()
