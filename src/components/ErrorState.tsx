export default function ErrorState({
  message = 'Something went wrong.',
  details = [],
}: {
  message?: string
  details?: string[]
}) {
  return (
    <div role="alert" className="rounded-xl border border-red-200 bg-red-50 px-4 py-3 text-red-700 text-sm">
      <p className="font-medium">{message}</p>
      {details.length > 0 && (
        <ul className="mt-2 list-disc pl-5 text-xs text-red-600 space-y-1">
          {details.map((d, i) => <li key={i}>{d}</li>)}
        </ul>
      )}
    </div>
  )
}
