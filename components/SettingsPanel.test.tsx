import { afterEach, describe, expect, it, vi } from 'vitest';
import { cleanup, fireEvent, render, screen } from '@testing-library/react';
import { DEFAULT_SETTINGS } from '../constants';
import SettingsPanel from './SettingsPanel';

describe('SettingsPanel', () => {
  afterEach(cleanup);

  it('shows the current values', () => {
    render(<SettingsPanel settings={DEFAULT_SETTINGS} onUpdate={vi.fn()} />);
    expect(screen.getByText('2020')).toBeTruthy();
    expect(screen.getByText('1.5')).toBeTruthy();
    expect(screen.getByText('0.05')).toBeTruthy();
  });

  it('reports a moved slider', () => {
    const onUpdate = vi.fn();
    render(<SettingsPanel settings={DEFAULT_SETTINGS} onUpdate={onUpdate} />);
    fireEvent.change(screen.getByLabelText('COVID threshold year'), { target: { value: '2021' } });
    expect(onUpdate).toHaveBeenCalledWith({ ...DEFAULT_SETTINGS, covidThresholdYear: 2021 });
  });
});
