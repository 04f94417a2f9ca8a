import { ComponentPropsWithoutRef } from 'react';

type SkipLinkProps = ComponentPropsWithoutRef<'a'>;

export default function SkipLink({
  children = 'Skip to content',
  className,
  href = '#main',
  ...rest
}: SkipLinkProps) {
  const baseClassName =
    'sr-only focus:not-sr-only focus:absolute focus:left-4 focus:top-4 focus:z-50 focus:rounded-lg focus:border focus:border-gray-300 focus:bg-white focus:px-4 focus:py-3 focus:text-gray-900 focus:shadow-lg';

  const mergedClassName = className ? `${baseClassName} ${className}` : baseClassName;

  return (
    <a href={href} className={mergedClassName} {...rest}>
      {children}
    </a>
  );
}
