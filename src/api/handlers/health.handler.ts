export function createHealthHandler() {
  return async () => ({ status: 'living the dream' });
}
