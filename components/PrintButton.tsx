'use client';

type PrintButtonProps = {
  label?: string;
  className?: string;
};

/** Prints the page; the button itself carries print:hidden so it stays off paper. */
export default function PrintButton({ label = 'Print timesheet', className = '' }: PrintButtonProps) {
  const handleClick = () => {
    window.scrollTo({ top: 0 });
    window.print();
  };

  return (
    <button
      type="button"
      onClick={handleClick}
      className={`print:hidden inline-flex items-center gap-2 rounded-md border border-gray-300 px-3 py-2 text-sm shadow-sm hover:opacity-90 ${className}`}
    >
      <svg width="16" height="16" viewBox="0 0 24 24" aria-hidden="true" focusable="false">
        <path
          d="M6 9V2h12v7M6 18H4a2 2 0 0 1-2-2v-5a2 2 0 0 1 2-2h16a2 2 0 0 1 2 2v5a2 2 0 0 1-2 2h-2m-12 0v4h12v-4H6Z"
          fill="currentColor"
        />
      </svg>
      {label}
    </button>
  );
}
