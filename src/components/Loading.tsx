export default function Loading({ label = 'Loading…' }: { label?: string }) {
  return (
    <div role="status" className="flex items-center gap-2 text-slate-500 text-sm">
      <span className="w-4 h-4 rounded-full border-2 border-teal-600 border-t-transparent animate-spin" aria-hidden />
      <span className="animate-pulse">{label}</span>
    </div>
  )
}
