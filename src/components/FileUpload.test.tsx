// @vitest-environment jsdom
import React from 'react';
import { describe, it, expect, vi, afterEach } from 'vitest';
import { render, screen, fireEvent, cleanup } from '@testing-library/react';
import { FileUpload } from './FileUpload';

afterEach(() => {
  cleanup();
});

describe('FileUpload', () => {
  it('passes the chosen file to the upload handler', () => {
    const onFileUpload = vi.fn();
    render(<FileUpload onFileUpload={onFileUpload} status="idle" />);
    const file = new File(['x'], 'pending.xlsx');

    fireEvent.change(screen.getByTestId('file-input'), { target: { files: [file] } });

    expect(onFileUpload).toHaveBeenCalledTimes(1);
    expect(onFileUpload).toHaveBeenCalledWith(file);
  });

  it('hides the file input while parsing', () => {
    render(<FileUpload onFileUpload={vi.fn()} status="parsing" />);
    expect(screen.queryByTestId('file-input')).toBeNull();
  });

  it('shows the upload error', () => {
    render(<FileUpload onFileUpload={vi.fn()} status="error" error="File is not an .xlsx workbook" />);
    expect(screen.getByRole('alert').textContent).toBe('File is not an .xlsx workbook');
  });
});
