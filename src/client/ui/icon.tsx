/** Material Symbols Outlined glyph; decorative, hidden from assistive tech. */
export function Icon({ name, class: cls }: { name: string; class?: string }) {
  return (
    <span class={`material-symbols-outlined${cls ? ` ${cls}` : ''}`} aria-hidden="true">
      {name}
    </span>
  );
}
