import { describe, expect, it } from 'vitest';
import { render } from '@testing-library/react';
import Message from './Message';

describe('Message', () => {
  it('renders model replies as Markdown', () => {
    const { container } = render(<Message role="model" content={'The host says **hello**.'} />);

    expect(container.querySelector('strong')?.textContent).toBe('hello');
  });

  it('shows user input exactly as typed', () => {
    const { container, getByText } = render(<Message role="user" content="<b>not bold</b>" />);

    expect(getByText('<b>not bold</b>')).toBeDefined();
    expect(container.querySelector('b')).toBeNull();
  });

  it('marks the role on the bubble', () => {
    const { container } = render(<Message role="model" content="Oops" isError />);

    expect(container.firstElementChild?.getAttribute('data-role')).toBe('model');
    expect(container.querySelector('.text-red-300')?.textContent?.trim()).toBe('Oops');
  });
});
