import { afterEach, describe, expect, it, vi } from 'vitest'
import { createSignalManager } from '../../../src/core/signals'

describe('createSignalManager', () => {
  const originalExitCode = process.exitCode

  afterEach(() => {
    process.exitCode = originalExitCode
  })

  it('aborts on SIGINT without exiting', () => {
    const exitSpy = vi.fn()
    const manager = createSignalManager({ exit: exitSpy, signals: ['SIGINT'] })

    process.emit('SIGINT')

    expect(manager.signal.aborted).toBe(true)
    expect(process.exitCode).toBe(130)
    expect(exitSpy).not.toHaveBeenCalled()

    manager.dispose()
  })

  it('uses SIGTERM exit code 143', () => {
    const exitSpy = vi.fn()
    const manager = createSignalManager({ exit: exitSpy, signals: ['SIGTERM'] })

    process.emit('SIGTERM')

    expect(manager.signal.aborted).toBe(true)
    expect(process.exitCode).toBe(143)

    manager.dispose()
  })

  it('force exits on second SIGINT', () => {
    const exitSpy = vi.fn()
    const manager = createSignalManager({ exit: exitSpy, signals: ['SIGINT'] })

    process.emit('SIGINT')
    process.emit('SIGINT')

    expect(exitSpy).toHaveBeenCalledTimes(1)
    expect(exitSpy).toHaveBeenCalledWith(130)

    manager.dispose()
  })

  it('stops listening once disposed', () => {
    const manager = createSignalManager({ exit: vi.fn(), signals: ['SIGUSR2'] })
    const before = process.listenerCount('SIGUSR2')

    manager.dispose()

    expect(process.listenerCount('SIGUSR2')).toBe(before - 1)
    expect(manager.signal.aborted).toBe(false)
  })
})
