import { createStore } from 'zustand/vanilla'
import type { StoreApi } from 'zustand/vanilla'
import type { InterfaceType, MigrationPhase, MigrationState } from '../types/migration'

/** Placeholder percentage shown before the first byte is counted */
export const STARTING_PERCENTAGE_LABEL = 'Starting…'

export interface MigrationStoreState extends MigrationState {
  setPhase: (phase: MigrationPhase) => void
  setProgress: (fraction: number, percentage: string) => void
  setEstimate: (estimatedTimeLeft: string, transferSpeed?: string) => void
  setInterface: (type: InterfaceType | null) => void
  setPowerConnected: (connected: boolean) => void
  setStartedAt: (startedAt: number | null) => void
}

/** Read-only view handed to observers */
export interface MigrationStateView {
  getState: () => MigrationState
  subscribe: (listener: (state: MigrationState, previous: MigrationState) => void) => () => void
}

export type MigrationStore = StoreApi<MigrationStoreState>

/** Label for the active interface; Wi-Fi and cellular read the same */
export function interfaceLabel(type: InterfaceType | null): string {
  switch (type) {
    case 'wifi':
    case 'cellular':
      return 'Wi-Fi'
    case 'wiredEthernet':
      return 'Thunderbolt'
    default:
      return ''
  }
}

export function createMigrationStore(initial: Partial<MigrationState> = {}): MigrationStore {
  return createStore<MigrationStoreState>((set) => ({
    phase: 'notStarted',
    fraction: 0,
    percentage: STARTING_PERCENTAGE_LABEL,
    estimatedTimeLeft: '',
    transferSpeed: '',
    interfaceLabel: '',
    powerConnected: true,
    startedAt: null,
    ...initial,

    setPhase: (phase) => set({ phase }),

    setProgress: (fraction, percentage) => set({ fraction, percentage }),

    setEstimate: (estimatedTimeLeft, transferSpeed) =>
      set((state) => ({
        estimatedTimeLeft,
        transferSpeed: transferSpeed ?? state.transferSpeed
      })),

    setInterface: (type) => set({ interfaceLabel: interfaceLabel(type) }),

    setPowerConnected: (connected) => set({ powerConnected: connected }),

    setStartedAt: (startedAt) => set({ startedAt })
  }))
}

/** Strip the setters so observers cannot write */
export function toStateView(store: MigrationStore): MigrationStateView {
  const snapshot = (state: MigrationStoreState): MigrationState => ({
    phase: state.phase,
    fraction: state.fraction,
    percentage: state.percentage,
    estimatedTimeLeft: state.estimatedTimeLeft,
    transferSpeed: state.transferSpeed,
    interfaceLabel: state.interfaceLabel,
    powerConnected: state.powerConnected,
    startedAt: state.startedAt
  })

  return {
    getState: () => snapshot(store.getState()),
    subscribe: (listener) =>
      store.subscribe((state, previous) => listener(snapshot(state), snapshot(previous)))
  }
}
