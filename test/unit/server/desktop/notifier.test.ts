import { describe, it, expect, vi } from 'vitest'
import type { DetachedLauncher } from '../../../../server/process-runner.js'
import { createNotifier, notificationCommand } from '../../../../server/desktop/notifier.js'

describe('notificationCommand', () => {
  it('prefers kdialog', () => {
    expect(notificationCommand('hello', 6, () => true)).toEqual(['kdialog', '--passivepopup', 'hello', '6'])
  })

  it('falls back to notify-send', () => {
    expect(notificationCommand('hello', 3, (name) => name === 'notify-send')).toEqual(['notify-send', 'claw-launcher', 'hello'])
  })

  it('returns null when neither is installed', () => {
    expect(notificationCommand('hello', 3, () => false)).toBeNull()
  })
})

describe('createNotifier', () => {
  it('launches the notifier with the default duration', async () => {
    const launch = vi.fn<DetachedLauncher>(async () => ({ ok: true }))
    const notify = createNotifier({ isAvailable: (name) => name === 'kdialog', launch })

    await notify('Gateway OK')

    expect(launch).toHaveBeenCalledWith('kdialog', ['--passivepopup', 'Gateway OK', '3'])
  })

  it('honours a custom duration', async () => {
    const launch = vi.fn<DetachedLauncher>(async () => ({ ok: true }))
    const notify = createNotifier({ isAvailable: (name) => name === 'kdialog', launch })

    await notify('slow', { seconds: 6 })

    expect(launch).toHaveBeenCalledWith('kdialog', ['--passivepopup', 'slow', '6'])
  })

  it('resolves without launching when no notifier exists', async () => {
    const launch = vi.fn<DetachedLauncher>(async () => ({ ok: true }))
    const notify = createNotifier({ isAvailable: () => false, launch })

    await expect(notify('quiet')).resolves.toBeUndefined()
    expect(launch).not.toHaveBeenCalled()
  })

  it('does not reject when the launch fails', async () => {
    const launch = vi.fn<DetachedLauncher>(async () => ({ ok: false, error: 'boom' }))
    const notify = createNotifier({ isAvailable: () => true, launch })

    await expect(notify('x')).resolves.toBeUndefined()
  })
})
