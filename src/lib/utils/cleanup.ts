type CleanupTask = () => void | Promise<void>;

const tasks = new Set<CleanupTask>();

export function registerCleanup(task: CleanupTask): () => void {
  tasks.add(task);
  return () => {
    tasks.delete(task);
  };
}

export async function runCleanup(): Promise<void> {
  const pending = Array.from(tasks);
  tasks.clear();
  for (const task of pending) {
    try {
      await task();
    } catch (err) {
      console.error("[cleanup] task failed:", err);
    }
  }
}
