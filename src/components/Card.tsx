import { ReactNode, useId } from 'react'

export default function Card({
  title,
  icon,
  right,
  className = '',
  children,
}: {
  title: string
  icon?: ReactNode
  right?: ReactNode
  className?: string
  children: ReactNode
}) {
  const headingId = useId()
  return (
    <section aria-labelledby={headingId} className={`bg-white/80 backdrop-blur rounded-2xl shadow-sm border overflow-hidden ${className}`}>
      <div className="px-4 py-3 border-b flex items-center justify-between gap-3">
        <h2 id={headingId} className="font-semibold flex items-center gap-2">
          {icon}
          {title}
        </h2>
        {right}
      </div>
      <div className="p-4">
        {children}
      </div>
    </section>
  )
}
