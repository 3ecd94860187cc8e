export * from './sti'
