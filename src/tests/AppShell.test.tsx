import { render, screen } from '@testing-library/react';
import { MemoryRouter } from 'react-router-dom';
import { afterEach, beforeEach, describe, test, expect, vi } from 'vitest';
import { AppRoutes } from '../App';

vi.mock('../routes/CatalogRoute', () => ({
  default: function BrokenCatalog(): never {
    throw new TypeError('catalog exploded');
  },
}));

describe('app shell', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });
  afterEach(() => {
    vi.restoreAllMocks();
  });

  test('a failing top-level route renders the error panel instead of unmounting', async () => {
    render(
      <MemoryRouter initialEntries={['/']}>
        <AppRoutes />
      </MemoryRouter>,
    );

    expect(await screen.findByRole('alert', undefined, { timeout: 5000 })).toHaveTextContent(
      'TypeError: catalog exploded',
    );
    expect(screen.getByRole('link', { name: 'Back to catalog' })).toHaveAttribute('href', '/');
  });
});
